/**
 * Memory tools for storing and recalling facts the user asked to keep.
 */

import type { ToolDefinition } from './types.js';
import { failure, normalizeKey, success } from './utils.js';

/**
 * Store a fact under a short key.
 */
export const rememberTool: ToolDefinition = {
  schema: {
    name: 'remember',
    description:
      'Save a fact the user wants remembered, under a short descriptive key. ' +
      'Example: "my favorite color is blue" -> key "favorite color", value "blue". ' +
      'Saving to an existing key replaces the old value.',
    parameters: [
      { name: 'key', type: 'string', required: true, description: 'Short label for the fact, e.g. "favorite color"' },
      { name: 'value', type: 'string', required: true, description: 'The information to remember' },
    ],
  },
  handler: async (args, { store }) => {
    const key = normalizeKey(args.string('key'));
    const value = args.string('value').trim();

    await store.remember(key, value);
    return success(`Saved "${key}".`);
  },
};

/**
 * Look up a fact by key.
 */
export const recallTool: ToolDefinition = {
  schema: {
    name: 'recall',
    description:
      'Look up a fact previously saved with remember. Use the same short key, e.g. "favorite color". ' +
      'If unsure of the key, call list_memories first.',
    parameters: [
      { name: 'key', type: 'string', required: true, description: 'The key the fact was saved under' },
    ],
  },
  handler: async (args, { store }) => {
    const key = normalizeKey(args.string('key'));
    const value = await store.recall(key);

    if (value === null) {
      return failure('NotFound', `no memory saved under "${key}"`);
    }
    return success(value);
  },
};

/**
 * List every stored fact.
 */
export const listMemoriesTool: ToolDefinition = {
  schema: {
    name: 'list_memories',
    description: 'List every saved fact with its key.',
    parameters: [],
  },
  handler: async (_args, { store }) => {
    const memories = await store.listMemories();

    if (memories.length === 0) {
      return success('No memories saved yet.');
    }
    const lines = memories.map((m) => `- ${m.key}: ${m.value}`);
    return success(`${memories.length} saved ${memories.length === 1 ? 'memory' : 'memories'}:\n${lines.join('\n')}`);
  },
};
