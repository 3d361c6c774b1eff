export type Command =
  | { kind: 'help' }
  | { kind: 'tools' }
  | { kind: 'new' }
  | { kind: 'sessions' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'query'; text: string };

type KeywordCommand = Exclude<Command, { kind: 'query' | 'empty' }>;

const KEYWORDS: Record<string, KeywordCommand> = {
  help: { kind: 'help' },
  tools: { kind: 'tools' },
  new: { kind: 'new' },
  sessions: { kind: 'sessions' },
  quit: { kind: 'quit' },
  exit: { kind: 'quit' },
  salir: { kind: 'quit' },
};

/** Keywords match exactly and case-sensitively; every other line is a query. */
export function parseCommand(line: string): Command {
  const text = line.trim();
  if (!text) return { kind: 'empty' };
  if (Object.hasOwn(KEYWORDS, text)) {
    return KEYWORDS[text];
  }
  return { kind: 'query', text };
}

export const HELP_TEXT = `
Available commands:
  help       Show this help
  tools      List the tools offered by the connected MCP servers
  new        Start a new conversation session
  sessions   List the sessions of this run
  quit/exit  Leave the application (salir works too)

Anything else is sent to the model as a question. The model may call the
tools listed by 'tools' to answer it; the conversation is kept per session.

Examples:
  List the files in the current directory
  Create a file called test.txt containing 'Hello World'
  Search the web for the latest Node.js release
`;
