/**
 * @fileoverview Memory admin API handlers.
 *
 * Provides endpoints for viewing and managing remembered facts.
 * This is an internal admin tool - no authentication required.
 */

import type { Request, Response } from 'express';
import type { AssistantStore } from '../services/store/index.js';
import { normalizeKey } from '../tools/utils.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'admin' });

export function createMemoryHandlers(store: AssistantStore) {
  return {
    /**
     * GET /admin/api/memories
     * Returns all memories, most recently updated first.
     */
    async list(_req: Request, res: Response): Promise<void> {
      try {
        const memories = await store.listMemories();
        res.json({ memories });
      } catch (error) {
        logger.error('admin_list_memories_failed', { error });
        res.status(500).json({ error: 'Failed to list memories' });
      }
    },

    /**
     * PUT /admin/api/memories/:key
     * Body: { value }. Keys are normalized the same way the remember tool
     * normalizes them.
     */
    async put(req: Request<{ key: string }>, res: Response): Promise<void> {
      const key = normalizeKey(req.params.key);
      const body: unknown = req.body;
      const value = typeof body === 'object' && body !== null && 'value' in body ? body.value : undefined;

      if (!key) {
        res.status(400).json({ error: 'key must be a non-empty string' });
        return;
      }
      if (typeof value !== 'string' || !value.trim()) {
        res.status(400).json({ error: 'value must be a non-empty string' });
        return;
      }

      try {
        await store.remember(key, value.trim());
        const memory = await store.getMemory(key);
        res.json({ memory });
      } catch (error) {
        logger.error('admin_put_memory_failed', { error });
        res.status(500).json({ error: 'Failed to save memory' });
      }
    },

    /**
     * DELETE /admin/api/memories/:key
     */
    async remove(req: Request<{ key: string }>, res: Response): Promise<void> {
      try {
        const deleted = await store.forget(normalizeKey(req.params.key));
        if (!deleted) {
          res.status(404).json({ error: 'Memory not found' });
          return;
        }
        res.status(204).send();
      } catch (error) {
        logger.error('admin_delete_memory_failed', { error });
        res.status(500).json({ error: 'Failed to delete memory' });
      }
    },
  };
}
