/**
 * Unit tests for AnthropicModelClient against the mocked SDK.
 */

import { describe, it, expect } from 'vitest';
import { AnthropicModelClient } from '../../../src/llm/client.js';
import type { Turn } from '../../../src/conversation/types.js';
import { rememberTool } from '../../../src/tools/memory.js';
import { ModelUnavailableError } from '../../../src/utils/errors.js';
import {
  addMockError,
  addMockResponse,
  createMixedResponse,
  createMultiToolUseResponse,
  createTextResponse,
  getCreateCalls,
} from '../../mocks/anthropic.js';

const turns: Turn[] = [
  { role: 'system', content: 'Be brief.', toolName: null },
  { role: 'user', content: 'Hello', toolName: null },
];

function createClient(): AnthropicModelClient {
  return new AnthropicModelClient({ apiKey: 'test-api-key', model: 'test-model', maxTokens: 256 });
}

describe('AnthropicModelClient', () => {
  it('returns a final message for a text response', async () => {
    addMockResponse(createTextResponse('  Hi there!  '));

    const response = await createClient().complete({ turns, tools: [] });

    expect(response).toEqual({ type: 'message', text: 'Hi there!' });
  });

  it('sends the configured model, token cap, system prompt and tools', async () => {
    const abort = new AbortController();

    await createClient().complete({ turns, tools: [rememberTool.schema], signal: abort.signal });

    const [call] = getCreateCalls();
    expect(call.model).toBe('test-model');
    expect(call.max_tokens).toBe(256);
    expect(call.system).toBe('Be brief.');
    expect(call.messages).toEqual([{ role: 'user', content: 'Hello' }]);
    expect(call.tools).toEqual([
      expect.objectContaining({ name: 'remember', input_schema: expect.objectContaining({ required: ['key', 'value'] }) }),
    ]);
    expect(call.signal).toBe(abort.signal);
  });

  it('returns tool calls in the order the model listed them', async () => {
    addMockResponse(
      createMultiToolUseResponse([
        { name: 'create_task', input: { description: 'buy milk' }, id: 'toolu_a' },
        { name: 'complete_task', input: { task_id: 1 }, id: 'toolu_b' },
      ])
    );

    const response = await createClient().complete({ turns, tools: [] });

    expect(response).toEqual({
      type: 'tool_calls',
      text: '',
      calls: [
        { id: 'toolu_a', name: 'create_task', arguments: { description: 'buy milk' } },
        { id: 'toolu_b', name: 'complete_task', arguments: { task_id: 1 } },
      ],
    });
  });

  it('keeps narration that comes with a tool call', async () => {
    addMockResponse(createMixedResponse('Let me look.', 'recall', { key: 'pet' }, 'toolu_c'));

    const response = await createClient().complete({ turns, tools: [] });

    expect(response).toEqual({
      type: 'tool_calls',
      text: 'Let me look.',
      calls: [{ id: 'toolu_c', name: 'recall', arguments: { key: 'pet' } }],
    });
  });

  it('joins several text blocks', async () => {
    addMockResponse({
      content: [
        { type: 'text', text: 'First part.' },
        { type: 'text', text: 'Second part.' },
      ],
      stop_reason: 'max_tokens',
    });

    const response = await createClient().complete({ turns, tools: [] });

    expect(response).toEqual({ type: 'message', text: 'First part.\nSecond part.' });
  });

  it('wraps SDK failures in ModelUnavailableError', async () => {
    addMockError(new Error('429 rate_limit_error'));

    const failure = createClient().complete({ turns, tools: [] });

    await expect(failure).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(failure).rejects.toThrow('Model unavailable: 429 rate_limit_error');
  });

  it('refuses to call the API without a user turn', async () => {
    const orphaned: Turn[] = [
      { role: 'system', content: 'Be brief.', toolName: null },
      { role: 'tool', content: 'Saved.', toolName: 'remember', toolCallId: 'toolu_x' },
    ];

    const failure = createClient().complete({ turns: orphaned, tools: [] });

    await expect(failure).rejects.toThrow('Model unavailable: History holds no user turn to answer');
    expect(getCreateCalls()).toHaveLength(0);
  });
});
