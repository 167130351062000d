/**
 * @fileoverview Entry point for the voice assistant core.
 *
 * Opens the store, starts the dashboard API when enabled, and runs the
 * text-mode conversation loop on stdin/stdout until the user says goodbye.
 *
 * @see .env.example for supported environment variables
 */

import type { Server } from 'http';
import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { runTextMode } from './cli/text-mode.js';
import { createConversation } from './conversation/index.js';
import { AnthropicModelClient } from './llm/index.js';
import { openStore, type AssistantStore } from './services/store/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

const logger = createLogger({ domain: 'app' });

let store: AssistantStore | null = null;
let server: Server | null = null;
let isShuttingDown = false;

// Graceful shutdown
function shutdown(reason: string, exitCode = 0): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_started', { reason });

  store?.close();
  store = null;

  if (!server) {
    process.exit(exitCode);
    return;
  }

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    logger.info('server_closed');
    process.exit(exitCode);
  });
}

async function main(): Promise<void> {
  // Fail fast if critical configuration is missing
  validateConfig();
  initObservability();

  const apiKey = config.anthropicApiKey;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY is required');
  }

  const openedStore = openStore(config.store.sqlitePath);
  store = openedStore;

  if (config.dashboard.enabled) {
    server = createApp(openedStore).listen(config.dashboard.port, () => {
      logger.info('dashboard_started', { port: config.dashboard.port, env: config.nodeEnv });
    });
  }

  const controller = createConversation({
    store: openedStore,
    model: new AnthropicModelClient({
      apiKey,
      model: config.model.id,
      maxTokens: config.model.maxTokens,
    }),
    historyCapacity: config.conversation.historyCapacity,
    maxToolRoundTrips: config.conversation.maxToolRoundTrips,
    systemPrompt: config.conversation.systemPrompt,
    timezone: config.conversation.timezone,
  });

  logger.info('assistant_started', {
    model: config.model.id,
    historyCapacity: config.conversation.historyCapacity,
    maxToolRoundTrips: config.conversation.maxToolRoundTrips,
    timezone: config.conversation.timezone,
  });

  await runTextMode({
    controller,
    input: process.stdin,
    output: process.stdout,
    signals: process,
  });

  shutdown('session_ended');
}

process.on('SIGTERM', () => shutdown('SIGTERM'));

main().catch((error: unknown) => {
  logger.fatal('startup_failed', { error });
  shutdown('startup_failed', 1);
});
