import { Command } from 'commander';
import { ChatLoop, type LinePrompter, type Printer } from './chat/chat-loop';
import { formatServerStatus } from './chat/render';
import { SessionRegistry } from './chat/sessions';
import { ReadlinePrompter, consolePrinter } from './chat/terminal';
import { loadConfig, type CliOptions, type LoadedConfig } from './config/load';
import { ConfigurationError } from './core/errors';
import { setLogLevel } from './core/logger';
import { createModelClient } from './llm';
import type { ModelClient } from './llm/types';
import { MCPConnector } from './mcp-clients';
import { ToolRegistry } from './mcp-clients/registry';
import type { ToolServerConnector } from './mcp-clients/types';
import type { AppConfig } from './config/schema';

export type CliDeps = {
  printer: Printer;
  createPrompter: () => LinePrompter & { close(): void };
  connector: ToolServerConnector;
  createModel: (config: AppConfig) => ModelClient;
  cwd: string;
};

function buildProgram(): Command {
  return new Command()
    .name('mcp-chat')
    .description(
      'Chat with an OpenAI-compatible model that can call MCP tool servers'
    )
    .version('1.0.0')
    .option(
      '-c, --config <path>',
      'tool-server file (default: mcp_config.json)'
    )
    .option('-p, --provider <name>', 'LLM provider: openai or openrouter')
    .option('-m, --model <name>', 'model name')
    .option('--plan', 'plan each request before calling tools');
}

function reportMissingEnvVars(printer: Printer, names: readonly string[]) {
  if (names.length === 0) return;
  printer.print(
    '⚠️  Missing environment variables referenced by the tool servers:'
  );
  for (const name of names) {
    printer.print(`   - ${name}`);
  }
  printer.print('💡 Set them in .env or export them, for example:');
  for (const name of names) {
    printer.print(`   export ${name}='...'`);
  }
}

/**
 * Runs the chat with the given user arguments and returns the exit code.
 * Configuration errors end it with 1 before any server is launched.
 */
export async function run(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CliDeps> = {}
): Promise<number> {
  const deps: CliDeps = {
    printer: consolePrinter,
    createPrompter: () => new ReadlinePrompter(),
    connector: new MCPConnector(),
    createModel: createModelClient,
    cwd: process.cwd(),
    ...overrides,
  };
  const { printer } = deps;

  const program = buildProgram().parse([...argv], { from: 'user' });

  let loaded: LoadedConfig;
  try {
    loaded = await loadConfig(program.opts<CliOptions>(), env, deps.cwd);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      printer.error(`❌ ${e.message}`);
      return 1;
    }
    throw e;
  }

  const appConfig = loaded.config;
  setLogLevel(appConfig.logLevel);

  if (loaded.createdConfigFile) {
    printer.print(
      '⚠️  Tool-server file not found, wrote an example to ' +
        appConfig.configPath
    );
  }
  reportMissingEnvVars(printer, appConfig.missingEnvVars);

  const tools = new ToolRegistry(deps.connector);
  try {
    const statuses = await tools.connectAll(appConfig.servers);
    for (const status of statuses) {
      const line = formatServerStatus(status);
      if (status.status === 'failed') printer.error(line);
      else printer.print(line);
    }

    const prompter = deps.createPrompter();
    try {
      const loop = new ChatLoop({
        sessions: new SessionRegistry(),
        tools,
        model: deps.createModel(appConfig),
        prompter,
        printer,
        maxToolIterations: appConfig.maxToolIterations,
        systemPrompt: appConfig.systemPrompt,
        planFirst: appConfig.planFirst,
      });
      return await loop.run();
    } finally {
      prompter.close();
    }
  } finally {
    await tools.closeAll();
  }
}
