/**
 * Read-only clock tool.
 */

import type { ToolDefinition } from './types.js';
import { success } from './utils.js';

/**
 * Format `date` as "Monday, 2026-10-19 14:05 (UTC)" in `timezone`.
 */
export function formatLocalTime(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    weekday: 'long',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('weekday')}, ${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')} (${timezone})`;
}

export const getCurrentTimeTool: ToolDefinition = {
  schema: {
    name: 'get_current_time',
    description: "Get the current date, weekday and time in the user's time zone.",
    parameters: [],
  },
  handler: async (_args, { now, timezone }) => success(`It is ${formatLocalTime(now(), timezone)}.`),
};
