/**
 * Task list tools.
 */

import type { TaskRecord } from '../services/store/index.js';
import { TASK_FILTERS, type TaskFilter } from '../services/store/index.js';
import type { ToolDefinition } from './types.js';
import { failure, success } from './utils.js';

function isTaskFilter(value: string): value is TaskFilter {
  return TASK_FILTERS.some((filter) => filter === value);
}

function formatTask(task: TaskRecord): string {
  return `#${task.id} [${task.status}] ${task.description}`;
}

function taskNotFound(id: number) {
  return failure('NotFound', `task ${id} not found`);
}

const TASK_ID_PARAMETER = {
  name: 'task_id',
  type: 'integer',
  required: true,
  description: 'The numeric id of the task, as shown by list_tasks',
} as const;

export const createTaskTool: ToolDefinition = {
  schema: {
    name: 'create_task',
    description: 'Add a new pending task to the to-do list. Returns the new task id.',
    parameters: [
      { name: 'description', type: 'string', required: true, description: 'What needs to be done, e.g. "buy groceries"' },
    ],
  },
  handler: async (args, { store }) => {
    const description = args.string('description').trim();
    const id = await store.createTask(description);
    return success(`Created task ${id}: ${description}.`);
  },
};

export const listTasksTool: ToolDefinition = {
  schema: {
    name: 'list_tasks',
    description: 'List tasks, oldest first. Optionally filter by status.',
    parameters: [
      {
        name: 'status',
        type: 'string',
        required: false,
        enum: TASK_FILTERS,
        description: 'Which tasks to list: all (default), pending or completed',
      },
    ],
  },
  handler: async (args, { store }) => {
    const requested = args.optionalString('status') ?? 'all';
    const filter: TaskFilter = isTaskFilter(requested) ? requested : 'all';
    const tasks = await store.listTasks(filter);

    const label = filter === 'all' ? '' : `${filter} `;
    if (tasks.length === 0) {
      return success(`No ${label}tasks.`);
    }
    return success(`${tasks.length} ${label}${tasks.length === 1 ? 'task' : 'tasks'}:\n${tasks.map(formatTask).join('\n')}`);
  },
};

export const completeTaskTool: ToolDefinition = {
  schema: {
    name: 'complete_task',
    description: 'Mark a task as completed. Completing an already completed task is harmless.',
    parameters: [TASK_ID_PARAMETER],
  },
  handler: async (args, { store }) => {
    const id = args.integer('task_id');
    const completion = await store.completeTask(id);

    if (!completion) {
      return taskNotFound(id);
    }
    const { task, changed } = completion;
    if (!changed) {
      return success(`Task ${id} was already completed: ${task.description}.`);
    }
    return success(`Completed task ${id}: ${task.description}.`);
  },
};

export const deleteTaskTool: ToolDefinition = {
  schema: {
    name: 'delete_task',
    description: 'Permanently remove a task from the list.',
    parameters: [TASK_ID_PARAMETER],
  },
  handler: async (args, { store }) => {
    const id = args.integer('task_id');
    const deleted = await store.deleteTask(id);

    if (!deleted) {
      return taskNotFound(id);
    }
    return success(`Deleted task ${id}.`);
  },
};
