/**
 * Tool registry.
 *
 * The set of tools is closed: every name the model may call is declared
 * here with its parameter schema, and input is validated against that
 * schema before a handler runs.
 */

import type { ToolContext, ToolDefinition, ToolOutcome, ToolSchema } from './types.js';
import { ToolArguments, failure, validateArguments } from './utils.js';
import { rememberTool, recallTool, listMemoriesTool } from './memory.js';
import { createTaskTool, listTasksTool, completeTaskTool, deleteTaskTool } from './tasks.js';
import { getCurrentTimeTool } from './clock.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'tools' });

/**
 * All tool definitions, in the order they are described to the model.
 */
export const ALL_TOOLS: readonly ToolDefinition[] = [
  // Memory
  rememberTool,
  recallTool,
  listMemoriesTool,
  // Tasks
  createTaskTool,
  listTasksTool,
  completeTaskTool,
  deleteTaskTool,
  // Clock
  getCurrentTimeTool,
];

/**
 * Render an outcome as the content of a tool turn.
 */
export function renderToolResult(outcome: ToolOutcome): string {
  return outcome.ok ? outcome.output : `${outcome.error.kind}: ${outcome.error.message}`;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly schemas: readonly ToolSchema[];

  constructor(
    private readonly context: ToolContext,
    definitions: readonly ToolDefinition[] = ALL_TOOLS
  ) {
    for (const definition of definitions) {
      if (this.tools.has(definition.schema.name)) {
        throw new Error(`Duplicate tool name: ${definition.schema.name}`);
      }
      this.tools.set(definition.schema.name, definition);
    }
    this.schemas = Object.freeze(definitions.map((d) => d.schema));
  }

  /**
   * Schemas of every tool, in registration order.
   */
  describe(): readonly ToolSchema[] {
    return this.schemas;
  }

  /**
   * Validate and execute a tool call. Never throws for unknown tools, bad
   * arguments, missing records or storage failures; those come back as
   * failed outcomes so the model can recover on its next round-trip.
   */
  async invoke(name: string, input: unknown): Promise<ToolOutcome> {
    const definition = this.tools.get(name);
    if (!definition) {
      logger.warn('tool_unknown', { toolName: name });
      return failure('UnknownTool', `unknown tool "${name}"`);
    }

    const validationError = validateArguments(definition.schema, input);
    if (validationError) {
      logger.warn('tool_invalid_arguments', { toolName: name, error: validationError });
      return failure('InvalidArguments', validationError);
    }

    const args = new ToolArguments(input);
    logger.info('tool_call_received', { toolName: name, argumentKeys: args.keys() });

    try {
      const outcome = await definition.handler(args, this.context);
      logger.info('tool_call_completed', {
        toolName: name,
        ok: outcome.ok,
        errorKind: outcome.ok ? undefined : outcome.error.kind,
      });
      return outcome;
    } catch (error) {
      if (error instanceof StorageError) {
        logger.error('tool_storage_failed', { toolName: name, error });
        return failure('StorageError', `could not access storage while running ${name}`);
      }
      throw error;
    }
  }
}

export type {
  ToolDefinition,
  ToolHandler,
  ToolContext,
  ToolOutcome,
  ToolSchema,
  ToolError,
  ToolErrorKind,
  ParameterSpec,
} from './types.js';
