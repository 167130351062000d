/**
 * Tool type definitions.
 */

import type { AssistantStore } from '../services/store/index.js';
import type { ToolArguments } from './utils.js';

export type ParameterType = 'string' | 'integer' | 'boolean';

/**
 * One named parameter of a tool.
 */
export interface ParameterSpec {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  /** Allowed values (string parameters only) */
  enum?: readonly string[];
}

/**
 * What the model is told about a tool.
 */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: readonly ParameterSpec[];
}

export type ToolErrorKind = 'UnknownTool' | 'InvalidArguments' | 'NotFound' | 'StorageError';

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

/**
 * Result of one tool invocation. `output` is always a human-readable
 * sentence or list; it becomes the content of a tool turn.
 */
export type ToolOutcome =
  | { ok: true; output: string }
  | { ok: false; error: ToolError };

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  store: AssistantStore;
  /** Wall clock for read-only time queries */
  now: () => Date;
  /** IANA time zone used when speaking times */
  timezone: string;
}

/**
 * Handler function type for tool execution. Arguments are already
 * validated against the tool's schema.
 */
export type ToolHandler = (
  args: ToolArguments,
  context: ToolContext
) => Promise<ToolOutcome>;

/**
 * Pairs a tool schema with its handler.
 */
export interface ToolDefinition {
  schema: ToolSchema;
  handler: ToolHandler;
}
