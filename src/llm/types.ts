/**
 * Type definitions for the model-access layer.
 *
 * The conversation loop talks to the language model only through
 * `ModelClient`; transport, auth and wire format stay in the adapter.
 */

import type { ToolCallRequest, Turn } from '../conversation/types.js';
import type { ToolSchema } from '../tools/index.js';

export interface ModelRequest {
  /** Conversation history, pinned system turn first */
  turns: readonly Turn[];
  /** Tools the model may call */
  tools: readonly ToolSchema[];
  /** Cancels the in-flight request when aborted */
  signal?: AbortSignal;
}

/**
 * Either a final natural-language message or a list of tool calls to run
 * in the given order. `text` on a tool-call response is any narration the
 * model produced alongside the calls.
 */
export type ModelResponse =
  | { type: 'message'; text: string }
  | { type: 'tool_calls'; text: string; calls: ToolCallRequest[] };

export interface ModelClient {
  /**
   * Run one model invocation.
   * @throws ModelUnavailableError when the endpoint cannot answer
   */
  complete(request: ModelRequest): Promise<ModelResponse>;
}
