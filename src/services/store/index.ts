/**
 * @fileoverview Store factory.
 *
 * The store is created explicitly and owned by the caller; there is no
 * module-level instance. Close it during graceful shutdown.
 */

import { SqliteAssistantStore, type SqliteStoreOptions } from './sqlite.js';
import type { AssistantStore } from './types.js';

export type { AssistantStore, MemoryRecord, TaskRecord, TaskStatus, TaskFilter } from './types.js';
export { TASK_FILTERS } from './types.js';
export { SqliteAssistantStore } from './sqlite.js';

/**
 * Open the SQLite store at `dbPath`, creating the file and schema if needed.
 */
export function openStore(dbPath: string, options?: SqliteStoreOptions): AssistantStore {
  return new SqliteAssistantStore(dbPath, options);
}
