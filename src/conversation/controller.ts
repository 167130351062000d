/**
 * Conversation Controller
 *
 * Runs one user turn at a time through the tool-dispatch loop:
 *
 *   idle -> awaiting_model -> (executing_tools -> awaiting_model)* -> responding -> idle
 *
 * Every turn ends back in `idle`, whatever happened inside it. Model
 * failures, tool errors and the round-trip cap are scoped to the turn.
 */

import type { ModelClient, ModelResponse } from '../llm/types.js';
import type { ToolRegistry } from '../tools/index.js';
import { renderToolResult } from '../tools/index.js';
import { ModelUnavailableError } from '../utils/errors.js';
import { createLogger, createTurnId, withLogContext } from '../utils/observability/index.js';
import type { HistoryBuffer } from './history-buffer.js';
import type { ControllerState, ToolCallRecord, TurnOutcome, TurnResult } from './types.js';

const logger = createLogger({ domain: 'conversation' });

export const DEFAULT_MAX_TOOL_ROUND_TRIPS = 5;

/** Spoken when the model endpoint cannot be reached. */
export const MODEL_UNAVAILABLE_REPLY =
  "Sorry, I can't reach my language model right now. Please try again in a moment.";

/** Spoken when the model keeps asking for tools past the round-trip cap. */
export const TOOL_LOOP_REPLY =
  "Sorry, I couldn't finish that request. Could you try asking in a simpler way?";

export interface ConversationControllerOptions {
  model: ModelClient;
  tools: ToolRegistry;
  history: HistoryBuffer;
  /** Rounds of tool execution allowed per user turn */
  maxToolRoundTrips?: number;
}

export interface HandleUtteranceOptions {
  /** Aborts the turn; no tool call starts after the abort is seen */
  signal?: AbortSignal;
}

export class ConversationController {
  private readonly model: ModelClient;
  private readonly tools: ToolRegistry;
  private readonly history: HistoryBuffer;
  private readonly maxToolRoundTrips: number;
  private currentState: ControllerState = 'idle';
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ConversationControllerOptions) {
    const maxToolRoundTrips = options.maxToolRoundTrips ?? DEFAULT_MAX_TOOL_ROUND_TRIPS;
    if (!Number.isInteger(maxToolRoundTrips) || maxToolRoundTrips < 1) {
      throw new RangeError(`maxToolRoundTrips must be an integer >= 1, got ${maxToolRoundTrips}`);
    }
    this.model = options.model;
    this.tools = options.tools;
    this.history = options.history;
    this.maxToolRoundTrips = maxToolRoundTrips;
  }

  get state(): ControllerState {
    return this.currentState;
  }

  /**
   * Process one utterance and resolve with the reply to speak.
   *
   * Calls made while a turn is running wait for it; turns never overlap.
   */
  handleUtterance(utterance: string, options: HandleUtteranceOptions = {}): Promise<TurnResult> {
    const run = this.queue.then(() => this.runTurn(utterance, options.signal));
    // The queue only orders turns; each caller sees its own turn's rejection.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private runTurn(utterance: string, signal: AbortSignal | undefined): Promise<TurnResult> {
    return withLogContext({ turnId: createTurnId() }, async (): Promise<TurnResult> => {
      const text = utterance.trim();
      if (!text) {
        logger.debug('utterance_ignored');
        return { outcome: 'ignored', reply: null, toolCalls: [], roundTrips: 0 };
      }

      const startTime = Date.now();
      const toolCalls: ToolCallRecord[] = [];
      let roundTrips = 0;

      const finish = (outcome: TurnOutcome, reply: string | null): TurnResult => {
        logger.info('turn_completed', {
          outcome,
          roundTrips,
          toolCallCount: toolCalls.length,
          durationMs: Date.now() - startTime,
        });
        return { outcome, reply, toolCalls, roundTrips };
      };

      const respond = (outcome: TurnOutcome, reply: string): TurnResult => {
        this.currentState = 'responding';
        this.history.append({ role: 'assistant', content: reply, toolName: null });
        return finish(outcome, reply);
      };

      try {
        this.history.append({ role: 'user', content: text, toolName: null });
        logger.info('turn_started', { utterance: text });

        let toolRounds = 0;
        for (;;) {
          if (signal?.aborted) return finish('aborted', null);

          this.currentState = 'awaiting_model';
          roundTrips++;

          let response: ModelResponse;
          try {
            response = await this.model.complete({
              turns: this.history.snapshot(),
              tools: this.tools.describe(),
              signal,
            });
          } catch (error) {
            if (signal?.aborted) return finish('aborted', null);
            if (error instanceof ModelUnavailableError) {
              logger.warn('model_unavailable', { error });
              return respond('model_unavailable', MODEL_UNAVAILABLE_REPLY);
            }
            throw error;
          }

          if (signal?.aborted) return finish('aborted', null);

          if (response.type === 'message') {
            return respond('replied', response.text);
          }

          if (toolRounds >= this.maxToolRoundTrips) {
            logger.warn('tool_loop_exceeded', {
              toolRounds,
              requested: response.calls.map((call) => call.name),
            });
            return respond('tool_loop_exceeded', TOOL_LOOP_REPLY);
          }

          this.currentState = 'executing_tools';
          toolRounds++;
          this.history.append({
            role: 'assistant',
            content: response.text,
            toolName: null,
            toolCalls: response.calls,
          });

          for (const call of response.calls) {
            if (signal?.aborted) return finish('aborted', null);

            const outcome = await this.tools.invoke(call.name, call.arguments);
            const result = renderToolResult(outcome);

            // The store effect stays, but a result that arrives after an
            // abort is not committed to history.
            if (signal?.aborted) return finish('aborted', null);

            this.history.append({
              role: 'tool',
              content: result,
              toolName: call.name,
              toolCallId: call.id,
              isError: !outcome.ok,
            });
            toolCalls.push({ name: call.name, arguments: call.arguments, ok: outcome.ok, result });
          }
        }
      } finally {
        this.currentState = 'idle';
      }
    });
  }
}
