/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the assistant requires.
 *
 * @see .env.example for supported environment variables
 */

import 'dotenv/config';
import { createLogger } from './utils/observability/index.js';

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

/** The host's IANA time zone, used when none is configured. */
function hostTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Check an IANA time zone name against the runtime's time zone database.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Model used for every conversational round-trip */
  model: {
    id: optional('ASSISTANT_MODEL_ID', 'claude-sonnet-4-20250514'),
    maxTokens: optionalInt('ASSISTANT_MAX_TOKENS', 1024),
  },

  /** Persistent memory/task store */
  store: {
    sqlitePath: dbPath('ASSISTANT_DB_PATH', '/app/data/assistant.db', './data/assistant.db'),
  },

  /** Conversation loop limits */
  conversation: {
    historyCapacity: optionalInt('HISTORY_CAPACITY', 20),
    maxToolRoundTrips: optionalInt('MAX_TOOL_ROUND_TRIPS', 5),
    /** Overrides the built-in system instruction when set */
    systemPrompt: process.env.SYSTEM_PROMPT,
    timezone: optional('ASSISTANT_TIMEZONE', hostTimezone()),
  },

  /** Dashboard API over the same store */
  dashboard: {
    enabled: optionalBool('DASHBOARD_ENABLED', true),
    port: optionalInt('PORT', 3000),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (!Number.isInteger(config.model.maxTokens) || config.model.maxTokens < 1) {
    errors.push(`ASSISTANT_MAX_TOKENS must be >= 1, got ${config.model.maxTokens}`);
  }
  // Pinned system turn + user turn + assistant tool request + one tool result
  if (!Number.isInteger(config.conversation.historyCapacity) || config.conversation.historyCapacity < 4) {
    errors.push(`HISTORY_CAPACITY must be >= 4, got ${config.conversation.historyCapacity}`);
  }
  const roundTrips = config.conversation.maxToolRoundTrips;
  if (!Number.isInteger(roundTrips) || roundTrips < 1 || roundTrips > 20) {
    errors.push(`MAX_TOOL_ROUND_TRIPS must be 1-20, got ${roundTrips}`);
  }
  if (!isValidTimezone(config.conversation.timezone)) {
    errors.push(`ASSISTANT_TIMEZONE must be an IANA time zone, got "${config.conversation.timezone}"`);
  }
  if (config.dashboard.port < 1 || config.dashboard.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.dashboard.port}`);
  }

  if (errors.length > 0) {
    createLogger({ domain: 'config' }).fatal('config_validation_failed', { errors });
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
