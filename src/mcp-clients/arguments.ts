import * as z from 'zod/v4';
import { InvocationError } from '../core/errors';

const argumentsSchema = z.record(z.string(), z.unknown());

function tryParse(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

/**
 * Parses the JSON argument string a model produced for a tool call. Smaller
 * models often emit slightly broken JSON, so one cleanup pass is attempted
 * before giving up.
 */
export function parseToolArguments(
  toolName: string,
  argumentsStr: string
): Record<string, unknown> {
  if (!argumentsStr.trim()) return {};

  for (const candidate of [argumentsStr, cleanJsonString(argumentsStr)]) {
    const result = argumentsSchema.safeParse(tryParse(candidate));
    if (result.success) return result.data;
  }

  throw new InvocationError(
    toolName,
    `Invalid arguments for tool ${toolName}: ` +
      `expected a JSON object, got ${argumentsStr}`
  );
}

export function cleanJsonString(jsonStr: string): string {
  let cleaned = jsonStr.trim();

  if (cleaned.startsWith('{}{')) {
    cleaned = cleaned.substring(2);
  }

  if (cleaned.startsWith('"{') && cleaned.endsWith('}"')) {
    cleaned = cleaned.substring(1, cleaned.length - 1);
  }

  cleaned = cleaned
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/\n/g, ' ')
    .replace(/\\"/g, '"')
    .replace(/\\\\/g, '\\');

  const openBraces = (cleaned.match(/{/g) || []).length;
  const closeBraces = (cleaned.match(/}/g) || []).length;

  if (openBraces > closeBraces) {
    cleaned += '}'.repeat(openBraces - closeBraces);
  }

  return cleaned;
}
