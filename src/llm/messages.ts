/**
 * Conversion between history turns and the Anthropic Messages API.
 *
 * ## Content Block Types
 * - `text`: Plain text content { type: 'text', text }
 * - `tool_use`: the model requesting a tool { type: 'tool_use', id, name, input }
 * - `tool_result`: result of a tool execution { type: 'tool_result', tool_use_id, content }
 *
 * Every `tool_use` block must be answered by a `tool_result` block with the
 * same id in the very next (user) message. The history buffer evicts single
 * turns, so its oldest entries can be half of such a pair; those halves are
 * dropped here rather than sent.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { Turn } from '../conversation/types.js';
import type { ToolSchema } from '../tools/index.js';

export interface AnthropicConversation {
  system: string | undefined;
  messages: Anthropic.MessageParam[];
}

/**
 * Build the system prompt and message list for one API call.
 *
 * - `system` turns become the system prompt
 * - turns before the first `user` turn are dropped (the API must start with a user message)
 * - tool calls are kept only when their result is present, and results only
 *   when they directly follow the assistant turn that requested them
 * - consecutive tool results are grouped into one user message
 */
export function buildMessages(turns: readonly Turn[]): AnthropicConversation {
  const systemParts: string[] = [];
  const messages: Anthropic.MessageParam[] = [];

  const answered = new Set<string>();
  for (const turn of turns) {
    if (turn.role === 'tool' && turn.toolCallId) answered.add(turn.toolCallId);
  }

  let started = false;
  // tool_use ids sent in the latest assistant message
  let awaitingResults = new Set<string>();

  for (const turn of turns) {
    switch (turn.role) {
      case 'system':
        systemParts.push(turn.content);
        break;

      case 'user':
        started = true;
        awaitingResults = new Set();
        messages.push({ role: 'user', content: turn.content });
        break;

      case 'assistant': {
        if (!started) break;

        const calls = (turn.toolCalls ?? []).filter((call) => answered.has(call.id));
        awaitingResults = new Set(calls.map((call) => call.id));

        if (calls.length === 0) {
          if (turn.content.trim()) {
            messages.push({ role: 'assistant', content: turn.content });
          }
          break;
        }

        const blocks: Anthropic.ContentBlockParam[] = [];
        if (turn.content.trim()) {
          blocks.push({ type: 'text', text: turn.content });
        }
        for (const call of calls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        messages.push({ role: 'assistant', content: blocks });
        break;
      }

      case 'tool': {
        if (!turn.toolCallId || !awaitingResults.has(turn.toolCallId)) break;

        const block: Anthropic.ToolResultBlockParam = {
          type: 'tool_result',
          tool_use_id: turn.toolCallId,
          content: turn.content,
          is_error: turn.isError ?? false,
        };
        const last = messages[messages.length - 1];
        if (last && last.role === 'user' && Array.isArray(last.content)) {
          last.content.push(block);
        } else {
          messages.push({ role: 'user', content: [block] });
        }
        break;
      }
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    messages,
  };
}

/**
 * Tool schemas in Anthropic's JSON-schema form.
 */
export function toAnthropicTools(schemas: readonly ToolSchema[]): Anthropic.Tool[] {
  return schemas.map((schema) => ({
    name: schema.name,
    description: schema.description,
    input_schema: {
      type: 'object' as const,
      properties: Object.fromEntries(
        schema.parameters.map((param) => [
          param.name,
          {
            type: param.type,
            description: param.description,
            ...(param.enum ? { enum: [...param.enum] } : {}),
          },
        ])
      ),
      required: schema.parameters.filter((param) => param.required).map((param) => param.name),
    },
  }));
}
