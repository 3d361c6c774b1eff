import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError, describeError } from '../core/errors';
import {
  PROVIDERS,
  configSchema,
  mcpConfigFileSchema,
  type AppConfig,
  type McpConfigFile,
  type ProviderName,
} from './schema';
import type { ToolServerSpec } from '../mcp-clients/types';

export type CliOptions = {
  config?: string;
  provider?: string;
  model?: string;
  plan?: boolean;
};

export type LoadedConfig = {
  config: AppConfig;
  /** Set when the tool-server file was missing and an example was written. */
  createdConfigFile: boolean;
};

const DEFAULT_CONFIG_PATH = 'mcp_config.json';
const DEFAULT_MAX_TOOL_ITERATIONS = 10;

const PROVIDER_DEFAULTS: Record<
  ProviderName,
  { keyVar: string; model: string; baseUrl?: string }
> = {
  openai: { keyVar: 'OPENAI_API_KEY', model: 'gpt-4o-mini' },
  openrouter: {
    keyVar: 'OPENROUTER_API_KEY',
    model: 'openai/gpt-4o-mini',
    baseUrl: 'https://openrouter.ai/api/v1',
  },
};

export const EXAMPLE_MCP_CONFIG: McpConfigFile = {
  mcpServers: {
    filesystem: {
      command: 'npx',
      args: [
        '-y',
        '@modelcontextprotocol/server-filesystem',
        '${MCP_FILESYSTEM_DIR}',
      ],
      description: 'List, read and write files in the configured directory',
      disabled: false,
    },
  },
};

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces `${VAR}` references with values from `env`. Unresolved references
 * stay in the string verbatim and their names are added to `missing`.
 */
export function expandEnvReferences(
  value: string,
  env: NodeJS.ProcessEnv,
  missing: Set<string>
): string {
  return value.replace(ENV_REFERENCE, (reference: string, name: string) => {
    const resolved = env[name];
    if (!resolved) {
      missing.add(name);
      return reference;
    }
    return resolved;
  });
}

function resolveProvider(
  options: CliOptions,
  env: NodeJS.ProcessEnv
): ProviderName {
  const requested = (options.provider ?? env.LLM_PROVIDER ?? 'openai')
    .trim()
    .toLowerCase();
  const provider = PROVIDERS.find((name) => name === requested);
  if (!provider) {
    throw new ConfigurationError(
      `Unknown LLM provider '${requested}' ` +
        `(expected one of: ${PROVIDERS.join(', ')})`
    );
  }
  return provider;
}

async function readServerFile(
  configPath: string
): Promise<{ file: McpConfigFile; created: boolean }> {
  let raw: string;
  let created = false;

  try {
    raw = await readFile(configPath, 'utf8');
  } catch (e) {
    if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) {
      throw new ConfigurationError(`Cannot read ${configPath}: ${String(e)}`);
    }
    raw = JSON.stringify(EXAMPLE_MCP_CONFIG, null, 2);
    await writeFile(configPath, `${raw}\n`);
    created = true;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(
      `${configPath} is not valid JSON: ${describeError(e)}`
    );
  }

  const parsed = mcpConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `${configPath}: ${formatIssues(parsed.error.issues)}`
    );
  }
  return { file: parsed.data, created };
}

function toServerSpecs(
  file: McpConfigFile,
  env: NodeJS.ProcessEnv,
  missing: Set<string>
): ToolServerSpec[] {
  return Object.entries(file.mcpServers)
    .filter(([, entry]) => !entry.disabled)
    .map(([name, entry]) => ({
      name,
      command: expandEnvReferences(entry.command, env, missing),
      args: entry.args.map((arg) => expandEnvReferences(arg, env, missing)),
      env: entry.env
        ? Object.fromEntries(
            Object.entries(entry.env).map(([key, value]) => [
              key,
              expandEnvReferences(value, env, missing),
            ])
          )
        : undefined,
      description: entry.description,
    }));
}

function isEnabled(value: string | undefined): boolean {
  const normalized = (value ?? '').trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

function formatIssues(
  issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>
): string {
  return issues
    .map((issue) => {
      const where = issue.path.map(String).join('.') || '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Loads runtime configuration from the environment and the tool-server file,
 * then validates the result. Throws `ConfigurationError` on anything missing
 * or malformed, naming the culprit.
 */
export async function loadConfig(
  options: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<LoadedConfig> {
  const provider = resolveProvider(options, env);
  const defaults = PROVIDER_DEFAULTS[provider];

  const apiKey = env[defaults.keyVar]?.trim();
  if (!apiKey) {
    throw new ConfigurationError(`${defaults.keyVar} is not set`);
  }

  const configPath = path.resolve(
    cwd,
    options.config ?? env.MCP_CONFIG_PATH ?? DEFAULT_CONFIG_PATH
  );
  const { file, created } = await readServerFile(configPath);

  const missing = new Set<string>();
  const servers = toServerSpecs(file, env, missing);

  const parsed = configSchema.safeParse({
    provider,
    apiKey,
    baseUrl: env.OPENAI_BASE_URL || defaults.baseUrl,
    model:
      options.model ?? (env.OPENAI_MODEL || env.LLM_MODEL || defaults.model),
    configPath,
    maxToolIterations: env.MAX_TOOL_ITERATIONS
      ? Number(env.MAX_TOOL_ITERATIONS)
      : DEFAULT_MAX_TOOL_ITERATIONS,
    logLevel: env.LOG_LEVEL ?? 'error',
    systemPrompt: env.SYSTEM_PROMPT || undefined,
    planFirst: options.plan ?? isEnabled(env.PLAN_FIRST),
    servers,
    missingEnvVars: [...missing].sort(),
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(parsed.error.issues)}`
    );
  }

  return { config: Object.freeze(parsed.data), createdConfigFile: created };
}
