import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactLogData } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`log file sink failed: ${error.message}\n`);
      closeFileSink();
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
    return null;
  }
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn' || level === 'fatal') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...getLogContext(),
    ...baseContext,
    ...(data ? redactLogData(data) : {}),
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  ensureFileSink()?.write(`${line}\n`);
}

/**
 * Create a structured logger. Every record is one JSON line; `baseContext`
 * and the active `withLogContext` scope are merged into it.
 */
export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (level === 'debug' && process.env.LOG_LEVEL !== 'debug') return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    fatal: (event: string, data?: LogData) => log('fatal', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Install process hooks that flush the file sink on exit.
 */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
  process.once('SIGTERM', closeFileSink);
}
