/**
 * Conversation Types
 */

export type TurnRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A structured request from the model to run a named tool.
 */
export interface ToolCallRequest {
  /** Model-assigned id pairing the request with its result */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * One role-tagged entry in the conversation history.
 *
 * - `system`: the pinned instruction turn (index 0 only)
 * - `assistant`: model text; may carry the tool calls it requested
 * - `tool`: the rendered result of one tool call
 */
export interface Turn {
  role: TurnRole;
  content: string;
  /** Tool that produced this turn (tool turns only) */
  toolName: string | null;
  /** Tool calls requested by this assistant turn */
  toolCalls?: readonly ToolCallRequest[];
  /** Id of the request this tool turn answers */
  toolCallId?: string;
  /** Whether this tool turn reports a failed call */
  isError?: boolean;
}

export type ControllerState = 'idle' | 'awaiting_model' | 'executing_tools' | 'responding';

export type TurnOutcome =
  | 'replied'
  | 'model_unavailable'
  | 'tool_loop_exceeded'
  | 'aborted'
  | 'ignored';

/**
 * A tool call executed during a turn, with its rendered result.
 */
export interface ToolCallRecord {
  name: string;
  arguments: Record<string, unknown>;
  ok: boolean;
  result: string;
}

export interface TurnResult {
  outcome: TurnOutcome;
  /** Text for the speech collaborator; null when the turn was aborted or ignored */
  reply: string | null;
  toolCalls: ToolCallRecord[];
  /** Model invocations made during the turn */
  roundTrips: number;
}
