/**
 * Shared utilities for tool handlers.
 */

import type { ParameterSpec, ToolErrorKind, ToolOutcome, ToolSchema } from './types.js';

/**
 * Successful outcome.
 */
export function success(output: string): ToolOutcome {
  return { ok: true, output };
}

/**
 * Failed outcome of the given kind.
 */
export function failure(kind: ToolErrorKind, message: string): ToolOutcome {
  return { ok: false, error: { kind, message } };
}

/**
 * Normalize a spoken memory key: trim, collapse whitespace, lower-case.
 * "  Favorite   Color " and "favorite color" address the same memory.
 */
export function normalizeKey(key: string): string {
  return key.trim().replace(/\s+/g, ' ').toLowerCase();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkParameter(spec: ParameterSpec, value: unknown): string | null {
  switch (spec.type) {
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return `${spec.name} must be an integer.`;
      }
      return null;
    case 'boolean':
      if (typeof value !== 'boolean') {
        return `${spec.name} must be a boolean.`;
      }
      return null;
    case 'string':
      if (typeof value !== 'string') {
        return `${spec.name} must be a string.`;
      }
      if (spec.required && !value.trim()) {
        return `${spec.name} must be a non-empty string.`;
      }
      if (spec.enum && !spec.enum.includes(value)) {
        return `${spec.name} must be one of: ${spec.enum.join(', ')}.`;
      }
      return null;
  }
}

/**
 * Validate raw tool input against a tool's declared parameters.
 * Returns an error message if validation fails, or null if input is valid.
 * Fields the schema does not declare are ignored.
 */
export function validateArguments(schema: ToolSchema, input: unknown): string | null {
  if (!isPlainObject(input)) {
    return 'arguments must be an object.';
  }

  for (const spec of schema.parameters) {
    const value = input[spec.name];

    if (value === undefined || value === null) {
      if (spec.required) {
        return `${spec.name} is required.`;
      }
      continue;
    }

    const error = checkParameter(spec, value);
    if (error) {
      return error;
    }
  }

  return null;
}

/**
 * Typed read access to arguments that passed `validateArguments`.
 * The accessors throw only if a handler asks for a parameter its schema
 * does not declare with that type.
 */
export class ToolArguments {
  private readonly values: Record<string, unknown>;

  constructor(values: unknown) {
    this.values = isPlainObject(values) ? values : {};
  }

  string(name: string): string {
    const value = this.values[name];
    if (typeof value !== 'string') {
      throw new TypeError(`Argument ${name} is not a string`);
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    const value = this.values[name];
    return value === undefined || value === null ? undefined : this.string(name);
  }

  integer(name: string): number {
    const value = this.values[name];
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new TypeError(`Argument ${name} is not an integer`);
    }
    return value;
  }

  keys(): string[] {
    return Object.keys(this.values);
  }
}
