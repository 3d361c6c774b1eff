import { describeError } from '../core/errors';
import type { ModelClient } from '../llm/types';
import type { ToolRegistry } from '../mcp-clients/registry';
import { HELP_TEXT, parseCommand, type Command } from './commands';
import { answerQuery } from './query';
import { formatSessions, formatToolCatalog } from './render';
import type { SessionRegistry } from './sessions';

export const PROMPT = '\n👤 You: ';

export interface LinePrompter {
  /** Resolves `null` once the input has ended. */
  question(prompt: string): Promise<string | null>;
}

export interface Printer {
  print(text: string): void;
  error(text: string): void;
}

export type ChatLoopState =
  | 'idle'
  | 'awaiting_input'
  | 'dispatching'
  | 'stopped';

export type ChatLoopOptions = {
  sessions: SessionRegistry;
  tools: ToolRegistry;
  model: ModelClient;
  prompter: LinePrompter;
  printer: Printer;
  maxToolIterations: number;
  systemPrompt?: string;
  planFirst?: boolean;
};

/**
 * Read-eval-print loop. One input is fully handled, model and tool round
 * trips included, before the next prompt is shown.
 */
export class ChatLoop {
  private currentState: ChatLoopState = 'idle';

  constructor(private readonly options: ChatLoopOptions) {}

  get state(): ChatLoopState {
    return this.currentState;
  }

  private isStopped(): boolean {
    return this.currentState === 'stopped';
  }

  async run(): Promise<number> {
    const { prompter } = this.options;
    this.printBanner();

    while (this.state !== 'stopped') {
      this.currentState = 'awaiting_input';
      const line = await prompter.question(PROMPT);
      const command: Command =
        line === null ? { kind: 'quit' } : parseCommand(line);

      this.currentState = 'dispatching';
      await this.dispatch(command);
      if (!this.isStopped()) {
        this.currentState = 'idle';
      }
    }
    return 0;
  }

  async dispatch(command: Command): Promise<void> {
    const { printer, sessions, tools } = this.options;

    switch (command.kind) {
      case 'empty':
        return;
      case 'help':
        printer.print(HELP_TEXT);
        return;
      case 'tools':
        printer.print(
          formatToolCatalog(tools.servers(), tools.toolsByServer()).join('\n')
        );
        return;
      case 'new': {
        const session = sessions.create();
        printer.print(`🆕 New session created: ${session.id}`);
        return;
      }
      case 'sessions':
        printer.print(
          formatSessions(sessions.list(), sessions.active()?.id).join('\n')
        );
        return;
      case 'quit':
        printer.print('👋 Goodbye!');
        await tools.closeAll();
        this.currentState = 'stopped';
        return;
      case 'query':
        await this.runQuery(command.text);
        return;
      default: {
        const unreachable: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async runQuery(text: string): Promise<void> {
    const { printer, sessions, tools, model } = this.options;
    const session = sessions.ensureActive();

    printer.print('🤖 Thinking...');
    try {
      const answer = await answerQuery(session.turns, text, {
        model,
        tools,
        maxToolIterations: this.options.maxToolIterations,
        systemPrompt: this.options.systemPrompt,
        planFirst: this.options.planFirst,
        onProgress: (line) => printer.print(line),
      });
      sessions.append(session.id, text, answer);
      printer.print(`🤖 Assistant:\n${answer}`);
    } catch (e) {
      printer.error(`❌ Error: ${describeError(e)}`);
    }
  }

  private printBanner(): void {
    const { printer, model } = this.options;
    printer.print(`🚀 MCP chat started (model: ${model.model})`);
    printer.print("💬 Type 'quit', 'exit' or 'salir' to leave");
    printer.print("📋 Type 'help' to list the commands");
    printer.print('─'.repeat(50));
  }
}
