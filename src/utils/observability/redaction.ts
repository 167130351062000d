const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential)/i;

// Conversational text is private to the user; only its length is logged.
const CONTENT_KEY_PATTERN = /^(utterance|reply|content|value|message|messages|systemPrompt|prompt|description)$/i;

const MAX_DEPTH = 6;

function redactString(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  return value;
}

function redactUnknown(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactString(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, depth + 1));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey)) {
        result[childKey] = '[REDACTED]';
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, depth + 1);
    }
    return result;
  }

  return String(value);
}

/**
 * Redact secrets and conversational content from a log payload.
 */
export function redactLogData(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : redactUnknown(value, key, 0);
  }
  return result;
}
