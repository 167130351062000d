export type * from './types.js';

export {
  createTurnId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export { redactLogData } from './redaction.js';
