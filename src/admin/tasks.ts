/**
 * @fileoverview Task admin API handlers.
 *
 * Reads and writes the same task table the assistant's tools use. This is
 * an internal admin tool - no authentication required.
 */

import type { Request, Response } from 'express';
import { TASK_FILTERS, type AssistantStore, type TaskFilter } from '../services/store/index.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'admin' });

function parseTaskId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function parseFilter(raw: unknown): TaskFilter | null {
  if (raw === undefined) return 'all';
  return TASK_FILTERS.find((filter) => filter === raw) ?? null;
}

export function createTaskHandlers(store: AssistantStore) {
  return {
    /**
     * GET /admin/api/tasks?status=all|pending|completed
     */
    async list(req: Request, res: Response): Promise<void> {
      const filter = parseFilter(req.query.status);
      if (!filter) {
        res.status(400).json({ error: `status must be one of: ${TASK_FILTERS.join(', ')}` });
        return;
      }

      try {
        const tasks = await store.listTasks(filter);
        res.json({ tasks });
      } catch (error) {
        logger.error('admin_list_tasks_failed', { error });
        res.status(500).json({ error: 'Failed to list tasks' });
      }
    },

    /**
     * POST /admin/api/tasks
     * Body: { description }
     */
    async create(req: Request, res: Response): Promise<void> {
      const body: unknown = req.body;
      const description =
        typeof body === 'object' && body !== null && 'description' in body ? body.description : undefined;

      if (typeof description !== 'string' || !description.trim()) {
        res.status(400).json({ error: 'description must be a non-empty string' });
        return;
      }

      try {
        const id = await store.createTask(description.trim());
        const task = await store.getTask(id);
        res.status(201).json({ task });
      } catch (error) {
        logger.error('admin_create_task_failed', { error });
        res.status(500).json({ error: 'Failed to create task' });
      }
    },

    /**
     * POST /admin/api/tasks/:id/complete
     */
    async complete(req: Request<{ id: string }>, res: Response): Promise<void> {
      const id = parseTaskId(req.params.id);
      if (id === null) {
        res.status(400).json({ error: 'Task id must be a positive integer' });
        return;
      }

      try {
        const completion = await store.completeTask(id);
        if (!completion) {
          res.status(404).json({ error: 'Task not found' });
          return;
        }
        res.json({ task: completion.task });
      } catch (error) {
        logger.error('admin_complete_task_failed', { error, taskId: id });
        res.status(500).json({ error: 'Failed to complete task' });
      }
    },

    /**
     * DELETE /admin/api/tasks/:id
     */
    async remove(req: Request<{ id: string }>, res: Response): Promise<void> {
      const id = parseTaskId(req.params.id);
      if (id === null) {
        res.status(400).json({ error: 'Task id must be a positive integer' });
        return;
      }

      try {
        const deleted = await store.deleteTask(id);
        if (!deleted) {
          res.status(404).json({ error: 'Task not found' });
          return;
        }
        res.status(204).send();
      } catch (error) {
        logger.error('admin_delete_task_failed', { error, taskId: id });
        res.status(500).json({ error: 'Failed to delete task' });
      }
    },
  };
}
