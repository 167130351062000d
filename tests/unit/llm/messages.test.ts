/**
 * Unit tests for converting history turns to Anthropic messages.
 */

import { describe, it, expect } from 'vitest';
import { buildMessages, toAnthropicTools } from '../../../src/llm/messages.js';
import type { Turn } from '../../../src/conversation/types.js';
import { completeTaskTool, listTasksTool } from '../../../src/tools/tasks.js';

const system: Turn = { role: 'system', content: 'Be brief.', toolName: null };

function user(content: string): Turn {
  return { role: 'user', content, toolName: null };
}

function assistant(content: string, calls: Array<{ id: string; name: string }> = []): Turn {
  return {
    role: 'assistant',
    content,
    toolName: null,
    toolCalls: calls.map((call) => ({ ...call, arguments: {} })),
  };
}

function tool(id: string, name: string, content: string, isError = false): Turn {
  return { role: 'tool', content, toolName: name, toolCallId: id, isError };
}

describe('buildMessages', () => {
  it('maps the pinned turn to the system prompt', () => {
    const result = buildMessages([system, user('Hi'), assistant('Hello!')]);

    expect(result).toEqual({
      system: 'Be brief.',
      messages: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ],
    });
  });

  it('leaves the system prompt undefined without a pinned turn', () => {
    expect(buildMessages([user('Hi')]).system).toBeUndefined();
  });

  it('pairs tool requests with their results', () => {
    const { messages } = buildMessages([
      system,
      user('What is my favorite color?'),
      assistant('Let me check.', [{ id: 'call_1', name: 'recall' }]),
      tool('call_1', 'recall', 'blue'),
      assistant('It is blue.'),
    ]);

    expect(messages).toEqual([
      { role: 'user', content: 'What is my favorite color?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Let me check.' },
          { type: 'tool_use', id: 'call_1', name: 'recall', input: {} },
        ],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'call_1', content: 'blue', is_error: false }],
      },
      { role: 'assistant', content: 'It is blue.' },
    ]);
  });

  it('groups consecutive tool results into one message', () => {
    const { messages } = buildMessages([
      user('Add two tasks'),
      assistant('', [
        { id: 'call_1', name: 'create_task' },
        { id: 'call_2', name: 'complete_task' },
      ]),
      tool('call_1', 'create_task', 'Created task 1: a.'),
      tool('call_2', 'complete_task', 'NotFound: task 9 not found', true),
    ]);

    expect(messages).toHaveLength(3);
    expect(messages[1]).toEqual({
      role: 'assistant',
      content: [
        { type: 'tool_use', id: 'call_1', name: 'create_task', input: {} },
        { type: 'tool_use', id: 'call_2', name: 'complete_task', input: {} },
      ],
    });
    expect(messages[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 'call_1', content: 'Created task 1: a.', is_error: false },
        { type: 'tool_result', tool_use_id: 'call_2', content: 'NotFound: task 9 not found', is_error: true },
      ],
    });
  });

  it('drops turns before the first user turn', () => {
    const { messages } = buildMessages([
      system,
      tool('call_0', 'recall', 'blue'),
      assistant('It is blue.'),
      user('Thanks'),
    ]);

    expect(messages).toEqual([{ role: 'user', content: 'Thanks' }]);
  });

  it('drops tool results whose request was evicted', () => {
    const { messages } = buildMessages([user('Hi'), tool('call_7', 'recall', 'blue'), assistant('Hello.')]);

    expect(messages).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello.' },
    ]);
  });

  it('drops tool requests that never got a result', () => {
    const { messages } = buildMessages([
      user('Add a task'),
      assistant('', [{ id: 'call_1', name: 'create_task' }]),
      user('Never mind'),
    ]);

    expect(messages).toEqual([
      { role: 'user', content: 'Add a task' },
      { role: 'user', content: 'Never mind' },
    ]);
  });

  it('keeps the narration of a partly answered request', () => {
    const { messages } = buildMessages([
      user('Add two tasks'),
      assistant('On it.', [
        { id: 'call_1', name: 'create_task' },
        { id: 'call_2', name: 'create_task' },
      ]),
      tool('call_1', 'create_task', 'Created task 1: a.'),
    ]);

    expect(messages[1]).toEqual({
      role: 'assistant',
      content: [
        { type: 'text', text: 'On it.' },
        { type: 'tool_use', id: 'call_1', name: 'create_task', input: {} },
      ],
    });
  });
});

describe('toAnthropicTools', () => {
  it('maps parameters to a JSON schema', () => {
    const [completeTask, listTasks] = toAnthropicTools([completeTaskTool.schema, listTasksTool.schema]);

    expect(completeTask).toEqual({
      name: 'complete_task',
      description: completeTaskTool.schema.description,
      input_schema: {
        type: 'object',
        properties: {
          task_id: { type: 'integer', description: 'The numeric id of the task, as shown by list_tasks' },
        },
        required: ['task_id'],
      },
    });
    expect(listTasks.input_schema).toEqual({
      type: 'object',
      properties: {
        status: {
          type: 'string',
          description: 'Which tasks to list: all (default), pending or completed',
          enum: ['all', 'pending', 'completed'],
        },
      },
      required: [],
    });
  });
});
