import * as z from 'zod/v4';
import type { Tool } from '../mcp-clients/types';
import { formatToolList } from './prompts';

const planStepSchema = z.object({
  step: z.number().optional(),
  action: z.string().optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
  description: z.string().optional(),
});

export const executionPlanSchema = z.object({
  task_description: z.string().min(1),
  required_tools: z.array(z.string()).default([]),
  execution_steps: z.array(planStepSchema).default([]),
  expected_outcome: z.string().optional(),
});

export type ExecutionPlan = z.infer<typeof executionPlanSchema>;

const FENCED_JSON = /```json\s*([\s\S]*?)```/;

export function buildPlannerPrompt(tools: readonly Tool[]): string {
  return [
    'You analyse requests and plan how to carry them out with the tools',
    'below. You do not call tools yourself.',
    '',
    'Available tools:',
    formatToolList(tools),
    '',
    'If the request is a general question, answer it directly.',
    'If it needs tools, explain briefly what you will do, then add one',
    'fenced block:',
    '```json',
    '{',
    '  "task_description": "What has to be done",',
    '  "required_tools": ["tool_name"],',
    '  "execution_steps": [',
    '    {',
    '      "step": 1,',
    '      "action": "tool_name",',
    '      "parameters": {},',
    '      "description": "What this step does"',
    '    }',
    '  ],',
    '  "expected_outcome": "What the user should get"',
    '}',
    '```',
  ].join('\n');
}

/** Reads the first fenced JSON plan out of a planner reply, if it has one. */
export function extractPlan(reply: string): ExecutionPlan | undefined {
  const match = FENCED_JSON.exec(reply);
  if (!match) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(match[1]);
  } catch {
    return undefined;
  }
  const parsed = executionPlanSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

export function buildExecutionPrompt(plan: ExecutionPlan): string {
  const lines = [`Carry out this task: ${plan.task_description}`];

  if (plan.execution_steps.length > 0) {
    lines.push('', 'Steps:');
    plan.execution_steps.forEach((step, index) => {
      lines.push(`${index + 1}. ${step.description ?? step.action ?? ''}`);
    });
  }
  if (plan.expected_outcome) {
    lines.push('', `Expected outcome: ${plan.expected_outcome}`);
  }
  return lines.join('\n');
}
