/**
 * Conversation Module
 *
 * Wires a controller to its collaborators: the tool registry over the
 * caller's store, a history buffer with the pinned system instruction,
 * and a model client.
 */

import type { ModelClient } from '../llm/types.js';
import { SYSTEM_PROMPT } from '../llm/prompts.js';
import type { AssistantStore } from '../services/store/index.js';
import { ToolRegistry } from '../tools/index.js';
import { ConversationController } from './controller.js';
import { DEFAULT_HISTORY_CAPACITY, HistoryBuffer } from './history-buffer.js';

export interface ConversationOptions {
  store: AssistantStore;
  model: ModelClient;
  historyCapacity?: number;
  maxToolRoundTrips?: number;
  /** Pinned instruction; the built-in voice prompt when omitted */
  systemPrompt?: string;
  /** IANA time zone for spoken times */
  timezone: string;
  now?: () => Date;
}

export function createConversation(options: ConversationOptions): ConversationController {
  const tools = new ToolRegistry({
    store: options.store,
    now: options.now ?? (() => new Date()),
    timezone: options.timezone,
  });
  const history = new HistoryBuffer({
    capacity: options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY,
    pinnedInstruction: options.systemPrompt ?? SYSTEM_PROMPT,
  });

  return new ConversationController({
    model: options.model,
    tools,
    history,
    maxToolRoundTrips: options.maxToolRoundTrips,
  });
}

export {
  ConversationController,
  MODEL_UNAVAILABLE_REPLY,
  TOOL_LOOP_REPLY,
  DEFAULT_MAX_TOOL_ROUND_TRIPS,
  type ConversationControllerOptions,
  type HandleUtteranceOptions,
} from './controller.js';
export { HistoryBuffer, DEFAULT_HISTORY_CAPACITY, type HistoryBufferOptions } from './history-buffer.js';
export type * from './types.js';
