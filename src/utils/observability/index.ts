export type * from './types.js';

export {
  createRunId,
  withLogContext,
  getLogContext,
  withRunLog,
  getRunLog,
} from './context.js';

export {
  createLogger,
  formatRunLogLine,
  initObservability,
} from './logger.js';

export {
  redactSecrets,
  safeSnippet,
} from './redaction.js';
