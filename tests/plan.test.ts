import { describe, expect, it } from 'vitest';

import {
  buildExecutionPrompt,
  buildPlannerPrompt,
  extractPlan,
} from '../src/chat/plan';

const planJson = JSON.stringify({
  task_description: 'Read notes.txt',
  required_tools: ['read_file'],
  execution_steps: [
    {
      step: 1,
      action: 'read_file',
      parameters: { path: 'notes.txt' },
      description: 'Read the note',
    },
  ],
  expected_outcome: 'The note text',
});

describe('extractPlan', () => {
  it('reads the fenced JSON plan from a reply', () => {
    const plan = extractPlan(
      `I will read it.\n\`\`\`json\n${planJson}\n\`\`\``
    );

    expect(plan).toEqual({
      task_description: 'Read notes.txt',
      required_tools: ['read_file'],
      execution_steps: [
        {
          step: 1,
          action: 'read_file',
          parameters: { path: 'notes.txt' },
          description: 'Read the note',
        },
      ],
      expected_outcome: 'The note text',
    });
  });

  it('fills in missing lists', () => {
    const plan = extractPlan('```json\n{"task_description":"Say hi"}\n```');

    expect(plan).toEqual({
      task_description: 'Say hi',
      required_tools: [],
      execution_steps: [],
    });
  });

  it.each([
    ['a plain answer', 'Paris is the capital of France.'],
    ['broken JSON', '```json\n{"task_description": \n```'],
    ['a block without a task', '```json\n{"required_tools": []}\n```'],
  ])('finds no plan in %s', (_name, reply) => {
    expect(extractPlan(reply)).toBeUndefined();
  });
});

describe('buildExecutionPrompt', () => {
  it('lists the steps and the expected outcome', () => {
    const plan = extractPlan(`\`\`\`json\n${planJson}\n\`\`\``);
    expect(plan).toBeDefined();
    if (!plan) return;

    expect(buildExecutionPrompt(plan)).toBe(
      [
        'Carry out this task: Read notes.txt',
        '',
        'Steps:',
        '1. Read the note',
        '',
        'Expected outcome: The note text',
      ].join('\n')
    );
  });

  it('falls back to the action name for a step without description', () => {
    expect(
      buildExecutionPrompt({
        task_description: 'List files',
        required_tools: [],
        execution_steps: [{ action: 'list_directory' }],
      })
    ).toBe('Carry out this task: List files\n\nSteps:\n1. list_directory');
  });
});

describe('buildPlannerPrompt', () => {
  it('lists the tools the plan may use', () => {
    const prompt = buildPlannerPrompt([
      {
        name: 'read_file',
        description: 'Read a file',
        input_schema: { type: 'object' },
        server: 'fs',
      },
    ]);

    expect(prompt).toContain(
      'Available tools:\n- read_file (fs): Read a file\n'
    );
  });
});
