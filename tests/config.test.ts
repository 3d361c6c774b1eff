import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  EXAMPLE_MCP_CONFIG,
  expandEnvReferences,
  loadConfig,
} from '../src/config/load';
import { ConfigurationError } from '../src/core/errors';

const env = { OPENAI_API_KEY: 'test-key' };
let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'mcp-chat-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeServers(
  content: unknown,
  name = 'mcp_config.json'
): Promise<string> {
  const file = path.join(dir, name);
  const text =
    typeof content === 'string' ? content : JSON.stringify(content);
  await writeFile(file, text);
  return file;
}

describe('expandEnvReferences', () => {
  it('replaces known references and records unknown ones', () => {
    const missing = new Set<string>();
    const result = expandEnvReferences('a-${X}-${Y}', { X: '1' }, missing);

    expect(result).toBe('a-1-${Y}');
    expect([...missing]).toEqual(['Y']);
  });
});

describe('loadConfig', () => {
  it('fails naming OPENAI_API_KEY when the credential is missing', async () => {
    const load = loadConfig({}, {}, dir);

    await expect(load).rejects.toBeInstanceOf(ConfigurationError);
    await expect(load).rejects.toThrow('OPENAI_API_KEY is not set');
  });

  it('treats a blank credential as missing', async () => {
    await expect(loadConfig({}, { OPENAI_API_KEY: '  ' }, dir)).rejects.toThrow(
      'OPENAI_API_KEY is not set'
    );
  });

  it('asks for OPENROUTER_API_KEY with the openrouter provider', async () => {
    await expect(
      loadConfig({}, { ...env, LLM_PROVIDER: 'openrouter' }, dir)
    ).rejects.toThrow('OPENROUTER_API_KEY is not set');
  });

  it('rejects unknown providers', async () => {
    await expect(loadConfig({ provider: 'claude' }, env, dir)).rejects.toThrow(
      "Unknown LLM provider 'claude' (expected one of: openai, openrouter)"
    );
  });

  it('writes an example tool-server file when none exists', async () => {
    const { config, createdConfigFile } = await loadConfig({}, env, dir);

    expect(createdConfigFile).toBe(true);
    expect(config.configPath).toBe(path.join(dir, 'mcp_config.json'));
    const written: unknown = JSON.parse(
      await readFile(config.configPath, 'utf8')
    );
    expect(written).toEqual(EXAMPLE_MCP_CONFIG);

    expect(config.servers).toHaveLength(1);
    expect(config.servers[0]).toMatchObject({
      name: 'filesystem',
      command: 'npx',
      args: [
        '-y',
        '@modelcontextprotocol/server-filesystem',
        '${MCP_FILESYSTEM_DIR}',
      ],
    });
    expect(config.missingEnvVars).toEqual(['MCP_FILESYSTEM_DIR']);
  });

  it('applies defaults for the openai provider', async () => {
    await writeServers({ mcpServers: {} });
    const { config, createdConfigFile } = await loadConfig({}, env, dir);

    expect(createdConfigFile).toBe(false);
    expect(config).toMatchObject({
      provider: 'openai',
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      maxToolIterations: 10,
      logLevel: 'error',
      servers: [],
      missingEnvVars: [],
    });
    expect(config.baseUrl).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies defaults for the openrouter provider', async () => {
    await writeServers({ mcpServers: {} });
    const { config } = await loadConfig(
      { provider: 'openrouter' },
      { OPENROUTER_API_KEY: 'test-key' },
      dir
    );

    expect(config.baseUrl).toBe('https://openrouter.ai/api/v1');
    expect(config.model).toBe('openai/gpt-4o-mini');
  });

  it('reads overrides from the environment and the command line', async () => {
    await writeServers({ mcpServers: {} }, 'servers.json');
    const { config } = await loadConfig(
      { config: 'servers.json', model: 'cli-model' },
      {
        OPENAI_API_KEY: 'test-key',
        OPENAI_MODEL: 'env-model',
        OPENAI_BASE_URL: 'http://localhost:11434/v1',
        MAX_TOOL_ITERATIONS: '3',
        LOG_LEVEL: 'debug',
        SYSTEM_PROMPT: 'Be terse.',
      },
      dir
    );

    expect(config).toMatchObject({
      configPath: path.join(dir, 'servers.json'),
      model: 'cli-model',
      baseUrl: 'http://localhost:11434/v1',
      maxToolIterations: 3,
      logLevel: 'debug',
      systemPrompt: 'Be terse.',
    });
  });

  it('expands ${VAR} references and drops disabled servers', async () => {
    await writeServers({
      mcpServers: {
        filesystem: {
          command: 'npx',
          args: [
            '-y',
            '@modelcontextprotocol/server-filesystem',
            '${DATA_DIR}/docs',
          ],
        },
        search: {
          command: 'npx',
          args: ['-y', '@modelcontextprotocol/server-brave-search'],
          env: { BRAVE_API_KEY: '${BRAVE_API_KEY}' },
        },
        legacy: { command: 'old-server', disabled: true },
      },
    });

    const { config } = await loadConfig(
      {},
      { ...env, DATA_DIR: '/data', BRAVE_API_KEY: 'test-secret' },
      dir
    );

    expect(config.servers.map((s) => s.name)).toEqual(['filesystem', 'search']);
    expect(config.servers[0].args).toEqual([
      '-y',
      '@modelcontextprotocol/server-filesystem',
      '/data/docs',
    ]);
    expect(config.servers[1].env).toEqual({ BRAVE_API_KEY: 'test-secret' });
    expect(config.missingEnvVars).toEqual([]);
  });

  it('lists unresolved references once each, sorted', async () => {
    await writeServers({
      mcpServers: {
        a: { command: 'a', args: ['${ZETA}', '${ALPHA}'] },
        b: { command: 'b', env: { KEY: '${ZETA}' } },
      },
    });

    const { config } = await loadConfig({}, env, dir);

    expect(config.missingEnvVars).toEqual(['ALPHA', 'ZETA']);
    expect(config.servers[0].args).toEqual(['${ZETA}', '${ALPHA}']);
  });

  it('reports malformed JSON', async () => {
    await writeServers('{ "mcpServers": ');
    await expect(loadConfig({}, env, dir)).rejects.toThrow(
      /mcp_config\.json is not valid JSON/
    );
  });

  it('reports schema violations with their path', async () => {
    await writeServers({ mcpServers: { bad: { command: '' } } });
    await expect(loadConfig({}, env, dir)).rejects.toThrow(
      'mcpServers.bad.command: command must not be empty'
    );
  });

  it('rejects a non-positive tool iteration limit', async () => {
    await writeServers({ mcpServers: {} });
    await expect(
      loadConfig({}, { ...env, MAX_TOOL_ITERATIONS: '0' }, dir)
    ).rejects.toThrow(/^Invalid configuration: maxToolIterations/);
  });

  it('turns planning on from PLAN_FIRST or the plan option', async () => {
    await writeServers({ mcpServers: {} });
    const off = await loadConfig({}, env, dir);
    const fromEnv = await loadConfig({}, { ...env, PLAN_FIRST: 'true' }, dir);
    const fromOption = await loadConfig({ plan: true }, env, dir);

    expect(off.config.planFirst).toBe(false);
    expect(fromEnv.config.planFirst).toBe(true);
    expect(fromOption.config.planFirst).toBe(true);
  });
});
