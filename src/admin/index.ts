/**
 * @fileoverview Admin routes for the dashboard.
 *
 * JSON API over the assistant's store, for use by a dashboard running
 * beside the voice loop. These routes have no authentication.
 *
 * Routes:
 * - GET /admin/api/tasks?status= - List tasks (all, pending or completed)
 * - POST /admin/api/tasks - Create a task
 * - POST /admin/api/tasks/:id/complete - Complete a task
 * - DELETE /admin/api/tasks/:id - Delete a task
 * - GET /admin/api/memories - List all memories
 * - PUT /admin/api/memories/:key - Save a memory
 * - DELETE /admin/api/memories/:key - Delete a memory
 */

import express, { Router } from 'express';
import type { AssistantStore } from '../services/store/index.js';
import { createMemoryHandlers } from './memory.js';
import { createTaskHandlers } from './tasks.js';

export function createAdminRouter(store: AssistantStore): Router {
  const router = Router();
  const tasks = createTaskHandlers(store);
  const memories = createMemoryHandlers(store);

  router.get('/admin/api/tasks', tasks.list);
  router.post('/admin/api/tasks', express.json(), tasks.create);
  router.post('/admin/api/tasks/:id/complete', tasks.complete);
  router.delete('/admin/api/tasks/:id', tasks.remove);

  router.get('/admin/api/memories', memories.list);
  router.put('/admin/api/memories/:key', express.json(), memories.put);
  router.delete('/admin/api/memories/:key', memories.remove);

  return router;
}
