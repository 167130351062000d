/**
 * Anthropic model client.
 *
 * ### Stop Reasons
 * - `end_turn`: the model finished naturally; the text is the reply
 * - `tool_use`: the model wants tool(s) run; results go back on the next call
 * - `max_tokens`: the reply was truncated; whatever text arrived is used
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ToolCallRequest } from '../conversation/types.js';
import { ModelUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import { buildMessages, toAnthropicTools } from './messages.js';
import type { ModelClient, ModelRequest, ModelResponse } from './types.js';

const logger = createLogger({ domain: 'llm' });

export interface AnthropicModelClientOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

function toArguments(input: unknown): Record<string, unknown> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return {};
  }
  return Object.fromEntries(Object.entries(input));
}

export class AnthropicModelClient implements ModelClient {
  private readonly client: Anthropic;

  constructor(private readonly options: AnthropicModelClientOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const { system, messages } = buildMessages(request.turns);
    if (messages.length === 0) {
      logger.error('model_request_empty', { turnCount: request.turns.length });
      throw new ModelUnavailableError(new Error('History holds no user turn to answer'));
    }
    const startTime = Date.now();

    logger.info('model_request', {
      model: this.options.model,
      messageCount: messages.length,
      toolCount: request.tools.length,
    });

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system,
          tools: toAnthropicTools(request.tools),
          messages,
        },
        { signal: request.signal }
      );
    } catch (error) {
      logger.error('model_call_failed', {
        error,
        durationMs: Date.now() - startTime,
      });
      throw new ModelUnavailableError(error);
    }

    logger.info('model_response', {
      stopReason: response.stop_reason,
      contentTypes: response.content.map((block) => block.type),
      inputTokens: response.usage?.input_tokens,
      outputTokens: response.usage?.output_tokens,
      durationMs: Date.now() - startTime,
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n')
      .trim();

    const calls: ToolCallRequest[] = response.content
      .filter((block): block is Anthropic.ToolUseBlock => block.type === 'tool_use')
      .map((block) => ({ id: block.id, name: block.name, arguments: toArguments(block.input) }));

    if (calls.length > 0) {
      return { type: 'tool_calls', text, calls };
    }
    return { type: 'message', text };
  }
}
