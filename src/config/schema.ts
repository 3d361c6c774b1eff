import * as z from 'zod/v4';
import { LOG_LEVELS } from '../core/logger';

export const PROVIDERS = ['openai', 'openrouter'] as const;
export type ProviderName = (typeof PROVIDERS)[number];

/** One entry under `mcpServers` in the tool-server file. */
export const serverEntrySchema = z.object({
  command: z.string().min(1, 'command must not be empty'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  description: z.string().optional(),
  disabled: z.boolean().default(false),
});

export const mcpConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), serverEntrySchema).default({}),
});

export type McpConfigFile = z.infer<typeof mcpConfigFileSchema>;

export const toolServerSpecSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()),
  env: z.record(z.string(), z.string()).optional(),
  description: z.string().optional(),
});

export const configSchema = z.object({
  provider: z.enum(PROVIDERS),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1),
  configPath: z.string().min(1),
  maxToolIterations: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
  systemPrompt: z.string().min(1).optional(),
  planFirst: z.boolean(),
  servers: z.array(toolServerSpecSchema),
  missingEnvVars: z.array(z.string()),
});

export type AppConfig = z.infer<typeof configSchema>;
