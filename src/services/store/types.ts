/**
 * Store Types
 *
 * Defines the persistent memory and task records shared by the
 * conversation loop and the dashboard API.
 */

/**
 * A remembered fact, addressed by a free-text key such as "favorite color".
 * Keys are unique; writing an existing key replaces its value.
 */
export interface MemoryRecord {
  key: string;
  value: string;
  /** Unix timestamp (milliseconds) of the last write */
  updatedAt: number;
}

export type TaskStatus = 'pending' | 'completed';

export type TaskFilter = 'all' | TaskStatus;

export const TASK_FILTERS: readonly TaskFilter[] = ['all', 'pending', 'completed'];

/**
 * A to-do item. `completedAt` is non-null exactly when `status` is 'completed'.
 */
export interface TaskRecord {
  /** Assigned by the store; increases monotonically and is never reused */
  id: number;
  description: string;
  status: TaskStatus;
  /** Unix timestamp (milliseconds) */
  createdAt: number;
  /** Unix timestamp (milliseconds) of the first completion */
  completedAt: number | null;
}

/**
 * Result of completing an existing task. `changed` is false when the task
 * was already completed before this call.
 */
export interface TaskCompletion {
  task: TaskRecord;
  changed: boolean;
}

/**
 * Interface for memory and task storage.
 *
 * Missing keys and ids are reported as `null` / `false`, never thrown.
 * Any I/O failure throws `StorageError` and leaves no partial write.
 *
 * Note: Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous. The async signature
 * allows swapping to an async backend without changing callers.
 */
export interface AssistantStore {
  /** Insert or replace the memory stored under `key`. */
  remember(key: string, value: string): Promise<void>;

  /** Exact-key lookup. Returns null when nothing is stored under `key`. */
  recall(key: string): Promise<string | null>;

  /** Full record for `key`, or null. */
  getMemory(key: string): Promise<MemoryRecord | null>;

  /** All memories, most recently updated first. */
  listMemories(): Promise<MemoryRecord[]>;

  /** Delete a memory. Returns false when the key did not exist. */
  forget(key: string): Promise<boolean>;

  /** Create a pending task and return its id. */
  createTask(description: string): Promise<number>;

  getTask(id: number): Promise<TaskRecord | null>;

  /** Tasks matching `filter`, oldest first. */
  listTasks(filter: TaskFilter): Promise<TaskRecord[]>;

  /**
   * Mark a task completed. Completing an already-completed task succeeds
   * and keeps the original completion time.
   * @returns The task after the update, or null if it does not exist
   */
  completeTask(id: number): Promise<TaskCompletion | null>;

  /** Permanently delete a task. Returns false when the id did not exist. */
  deleteTask(id: number): Promise<boolean>;

  /** Release the underlying connection. */
  close(): void;
}
