import * as z from 'zod/v4';
import type { ToolOutput } from './types';

const textPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const resourcePartSchema = z.object({
  type: z.literal('resource'),
  resource: z.object({
    uri: z.string(),
    text: z.string().optional(),
  }),
});

const otherPartSchema = z.object({
  type: z.string(),
  mimeType: z.string().optional(),
  uri: z.string().optional(),
});

const callToolResultSchema = z.object({
  content: z.array(z.unknown()).optional(),
  structuredContent: z.record(z.string(), z.unknown()).optional(),
  isError: z.boolean().optional(),
  toolResult: z.unknown().optional(),
});

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function renderPart(part: unknown): string {
  const text = textPartSchema.safeParse(part);
  if (text.success) return text.data.text;

  const resource = resourcePartSchema.safeParse(part);
  if (resource.success) {
    const { text, uri } = resource.data.resource;
    return text ?? `[resource ${uri}]`;
  }

  const other = otherPartSchema.safeParse(part);
  if (other.success) {
    const { type, mimeType, uri } = other.data;
    const details = [type, mimeType, uri].filter(
      (value): value is string => Boolean(value)
    );
    return `[${details.join(' ')}]`;
  }

  return JSON.stringify(part);
}

/**
 * Flattens a `tools/call` result into the text handed back to the model.
 * Content parts win over `structuredContent`; the pre-2024-11 `toolResult`
 * shape is still accepted.
 */
export function renderToolResult(result: unknown): ToolOutput {
  const parsed = callToolResultSchema.safeParse(result);
  if (!parsed.success) {
    return { text: stringify(result), isError: false };
  }

  const { content, structuredContent, isError, toolResult } = parsed.data;
  let text = '';
  if (content && content.length > 0) {
    text = content.map(renderPart).join('\n');
  } else if (structuredContent) {
    text = JSON.stringify(structuredContent);
  } else if (toolResult !== undefined) {
    text = stringify(toolResult);
  }

  return { text, isError: isError === true };
}
