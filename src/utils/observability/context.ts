import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with `context` merged into every log record emitted inside it,
 * including records emitted after an await.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

export function createTurnId(prefix = 'turn'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
