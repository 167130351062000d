/**
 * Unit tests for SqliteAssistantStore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'fs';
import { SqliteAssistantStore } from '../../../src/services/store/sqlite.js';
import { StorageError } from '../../../src/utils/errors.js';
import { FakeClock, resetTestDb } from '../../helpers/store.js';

const TEST_DB_PATH = './data/test-store.db';

describe('SqliteAssistantStore', () => {
  let clock: FakeClock;
  let store: SqliteAssistantStore;

  beforeEach(() => {
    resetTestDb(TEST_DB_PATH);
    clock = new FakeClock();
    store = new SqliteAssistantStore(TEST_DB_PATH, { now: clock.now });
  });

  afterEach(() => {
    store.close();
    resetTestDb(TEST_DB_PATH);
  });

  describe('tasks', () => {
    it('creates pending tasks with increasing ids', async () => {
      const first = await store.createTask('buy groceries');
      const second = await store.createTask('call the plumber');

      expect(first).toBe(1);
      expect(second).toBe(2);

      const tasks = await store.listTasks('all');
      expect(tasks).toEqual([
        { id: 1, description: 'buy groceries', status: 'pending', createdAt: 1000, completedAt: null },
        { id: 2, description: 'call the plumber', status: 'pending', createdAt: 1000, completedAt: null },
      ]);
    });

    it('filters by status', async () => {
      await store.createTask('buy groceries');
      await store.createTask('water the plants');
      await store.completeTask(1);

      const pending = await store.listTasks('pending');
      const completed = await store.listTasks('completed');

      expect(pending.map((t) => t.id)).toEqual([2]);
      expect(completed.map((t) => t.id)).toEqual([1]);
    });

    it('completes a task and stamps the completion time', async () => {
      const id = await store.createTask('buy groceries');
      clock.advance(500);

      const completion = await store.completeTask(id);

      expect(completion).toEqual({
        task: {
          id,
          description: 'buy groceries',
          status: 'completed',
          createdAt: 1000,
          completedAt: 1500,
        },
        changed: true,
      });
    });

    it('keeps the first completion time when completing twice', async () => {
      const id = await store.createTask('buy groceries');
      clock.advance(500);
      await store.completeTask(id);
      clock.advance(500);

      const again = await store.completeTask(id);

      expect(again?.changed).toBe(false);
      expect(again?.task.status).toBe('completed');
      expect(again?.task.completedAt).toBe(1500);
      expect((await store.getTask(id))?.completedAt).toBe(1500);
    });

    it('returns null when completing a missing task', async () => {
      expect(await store.completeTask(99)).toBeNull();
      expect(await store.listTasks('all')).toEqual([]);
    });

    it('deletes tasks and never reuses their ids', async () => {
      await store.createTask('first');
      const second = await store.createTask('second');

      expect(await store.deleteTask(second)).toBe(true);
      expect((await store.listTasks('all')).map((t) => t.id)).toEqual([1]);

      const third = await store.createTask('third');
      expect(third).toBe(3);
    });

    it('returns false when deleting a missing task', async () => {
      expect(await store.deleteTask(42)).toBe(false);
    });

    it('returns null from getTask for an unknown id', async () => {
      expect(await store.getTask(7)).toBeNull();
    });
  });

  describe('memories', () => {
    it('recalls the last value written to a key', async () => {
      await store.remember('favorite color', 'green');
      await store.remember('favorite color', 'blue');

      expect(await store.recall('favorite color')).toBe('blue');
      expect(await store.listMemories()).toHaveLength(1);
    });

    it('returns null for an unknown key', async () => {
      expect(await store.recall('shoe size')).toBeNull();
      expect(await store.getMemory('shoe size')).toBeNull();
    });

    it('reads a single memory record', async () => {
      await store.remember('pet name', 'Rex');
      clock.advance(10);
      await store.remember('favorite color', 'blue');

      expect(await store.getMemory('pet name')).toEqual({ key: 'pet name', value: 'Rex', updatedAt: 1000 });
    });

    it('lists the most recently updated memories first', async () => {
      await store.remember('pet name', 'Rex');
      clock.advance(10);
      await store.remember('favorite color', 'blue');
      await store.remember('birthday', 'May 3');

      const memories = await store.listMemories();

      expect(memories).toEqual([
        { key: 'birthday', value: 'May 3', updatedAt: 1010 },
        { key: 'favorite color', value: 'blue', updatedAt: 1010 },
        { key: 'pet name', value: 'Rex', updatedAt: 1000 },
      ]);
    });

    it('forgets a memory once', async () => {
      await store.remember('pet name', 'Rex');

      expect(await store.forget('pet name')).toBe(true);
      expect(await store.forget('pet name')).toBe(false);
      expect(await store.recall('pet name')).toBeNull();
    });
  });

  describe('durability', () => {
    it('keeps data across reopen', async () => {
      await store.remember('favorite color', 'blue');
      const id = await store.createTask('buy groceries');
      await store.completeTask(id);
      store.close();

      store = new SqliteAssistantStore(TEST_DB_PATH, { now: clock.now });

      expect(await store.recall('favorite color')).toBe('blue');
      expect(await store.getTask(id)).toEqual({
        id,
        description: 'buy groceries',
        status: 'completed',
        createdAt: 1000,
        completedAt: 1000,
      });
      expect(await store.createTask('next')).toBe(2);
    });
  });

  describe('schema constraints', () => {
    it('rejects a completed task without a completion time from another writer', () => {
      const db = new Database(TEST_DB_PATH);
      try {
        expect(() =>
          db
            .prepare(
              `INSERT INTO tasks (description, status, created_at, completed_at)
               VALUES ('bad', 'completed', 1, NULL)`
            )
            .run()
        ).toThrow(/CHECK constraint failed/);

        expect(() =>
          db
            .prepare(
              `INSERT INTO tasks (description, status, created_at, completed_at)
               VALUES ('bad', 'pending', 1, 5)`
            )
            .run()
        ).toThrow(/CHECK constraint failed/);
      } finally {
        db.close();
      }
    });
  });

  describe('failures', () => {
    const BROKEN_DB_PATH = './data/test-store-broken.db';

    afterEach(() => {
      resetTestDb(BROKEN_DB_PATH);
    });

    it('closes the connection when the schema cannot be created', () => {
      resetTestDb(BROKEN_DB_PATH);
      const legacy = new Database(BROKEN_DB_PATH);
      legacy.exec('CREATE TABLE tasks (id INTEGER PRIMARY KEY)');
      legacy.close();

      let failure: unknown;
      try {
        new SqliteAssistantStore(BROKEN_DB_PATH);
      } catch (error) {
        failure = error;
      }

      expect(failure).toBeInstanceOf(StorageError);
      expect(failure).toMatchObject({ context: { operation: 'initSchema' } });
      // The last connection to a WAL database removes its log on close.
      expect(fs.existsSync(`${BROKEN_DB_PATH}-wal`)).toBe(false);
    });

    it('throws StorageError when the connection is closed', async () => {
      const other = new SqliteAssistantStore(TEST_DB_PATH);
      other.close();

      await expect(other.recall('anything')).rejects.toBeInstanceOf(StorageError);
      await expect(other.createTask('anything')).rejects.toMatchObject({
        code: 'STORAGE_ERROR',
        context: { operation: 'createTask' },
      });
    });
  });
});
