/**
 * @fileoverview SQLite assistant store.
 *
 * Stores remembered facts (key/value) and the task list in one SQLite file.
 * The dashboard API opens the same file, so every invariant that matters to
 * both writers is enforced by the schema itself:
 * - memory keys are unique (primary key)
 * - task ids come from AUTOINCREMENT and are never reused after a delete
 * - completed_at is set if and only if status = 'completed'
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { StorageError } from '../../utils/errors.js';
import type { AssistantStore, MemoryRecord, TaskCompletion, TaskFilter, TaskRecord, TaskStatus } from './types.js';

export interface SqliteStoreOptions {
  /** Clock in Unix milliseconds. Defaults to Date.now. */
  now?: () => number;
  /** How long a write waits for another connection's lock, in milliseconds. */
  busyTimeoutMs?: number;
}

interface MemoryRow {
  key: string;
  value: string;
  updated_at: number;
}

interface TaskRow {
  id: number;
  description: string;
  status: TaskStatus;
  created_at: number;
  completed_at: number | null;
}

const TASK_COLUMNS = 'id, description, status, created_at, completed_at';

function toTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    description: row.description,
    status: row.status,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

function toMemory(row: MemoryRow): MemoryRecord {
  return {
    key: row.key,
    value: row.value,
    updatedAt: row.updated_at,
  };
}

/**
 * SQLite implementation of the assistant store.
 */
export class SqliteAssistantStore implements AssistantStore {
  private db: Database.Database;
  private readonly now: () => number;

  /**
   * @param dbPath Path to SQLite database file
   */
  constructor(dbPath: string, options: SqliteStoreOptions = {}) {
    this.now = options.now ?? Date.now;

    this.db = this.guard('open', () => {
      // Ensure directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
      return db;
    });
    try {
      this.guard('initSchema', () => this.initSchema());
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        description TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'completed')),
        created_at INTEGER NOT NULL,
        completed_at INTEGER,
        CHECK ((status = 'completed') = (completed_at IS NOT NULL))
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at, id);
    `);
  }

  /**
   * Run a driver call, converting any failure into StorageError.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(operation, error);
    }
  }

  private selectTask(id: number): TaskRecord | null {
    const row = this.db
      .prepare<[number], TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`)
      .get(id);
    return row ? toTask(row) : null;
  }

  async remember(key: string, value: string): Promise<void> {
    this.guard('remember', () => {
      this.db
        .prepare<[string, string, number]>(
          `INSERT INTO memories (key, value, updated_at)
           VALUES (?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET
             value = excluded.value,
             updated_at = excluded.updated_at`
        )
        .run(key, value, this.now());
    });
  }

  async recall(key: string): Promise<string | null> {
    return this.guard('recall', () => {
      const row = this.db
        .prepare<[string], Pick<MemoryRow, 'value'>>(`SELECT value FROM memories WHERE key = ?`)
        .get(key);
      return row ? row.value : null;
    });
  }

  async getMemory(key: string): Promise<MemoryRecord | null> {
    return this.guard('getMemory', () => {
      const row = this.db
        .prepare<[string], MemoryRow>(`SELECT key, value, updated_at FROM memories WHERE key = ?`)
        .get(key);
      return row ? toMemory(row) : null;
    });
  }

  async listMemories(): Promise<MemoryRecord[]> {
    return this.guard('listMemories', () =>
      this.db
        .prepare<[], MemoryRow>(
          `SELECT key, value, updated_at
           FROM memories
           ORDER BY updated_at DESC, key ASC`
        )
        .all()
        .map(toMemory)
    );
  }

  async forget(key: string): Promise<boolean> {
    return this.guard('forget', () => {
      const result = this.db
        .prepare<[string]>(`DELETE FROM memories WHERE key = ?`)
        .run(key);
      return result.changes > 0;
    });
  }

  async createTask(description: string): Promise<number> {
    return this.guard('createTask', () => {
      const result = this.db
        .prepare<[string, number]>(
          `INSERT INTO tasks (description, status, created_at, completed_at)
           VALUES (?, 'pending', ?, NULL)`
        )
        .run(description, this.now());
      return Number(result.lastInsertRowid);
    });
  }

  async getTask(id: number): Promise<TaskRecord | null> {
    return this.guard('getTask', () => this.selectTask(id));
  }

  async listTasks(filter: TaskFilter): Promise<TaskRecord[]> {
    return this.guard('listTasks', () => {
      if (filter === 'all') {
        return this.db
          .prepare<[], TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks ORDER BY created_at ASC, id ASC`)
          .all()
          .map(toTask);
      }
      return this.db
        .prepare<[TaskStatus], TaskRow>(
          `SELECT ${TASK_COLUMNS} FROM tasks WHERE status = ? ORDER BY created_at ASC, id ASC`
        )
        .all(filter)
        .map(toTask);
    });
  }

  async completeTask(id: number): Promise<TaskCompletion | null> {
    return this.guard('completeTask', () => {
      const complete = this.db.transaction((taskId: number): TaskCompletion | null => {
        // Only a pending task gets a timestamp; the first completion wins.
        const result = this.db
          .prepare<[number, number]>(
            `UPDATE tasks SET status = 'completed', completed_at = ?
             WHERE id = ? AND status = 'pending'`
          )
          .run(this.now(), taskId);
        const task = this.selectTask(taskId);
        return task ? { task, changed: result.changes > 0 } : null;
      });
      return complete(id);
    });
  }

  async deleteTask(id: number): Promise<boolean> {
    return this.guard('deleteTask', () => {
      const result = this.db
        .prepare<[number]>(`DELETE FROM tasks WHERE id = ?`)
        .run(id);
      return result.changes > 0;
    });
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
