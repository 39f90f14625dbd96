/**
 * Structured audit logging for triage runs.
 */

export type * from './types.js';

export { createRunId, getLogContext, withLogContext, withRun } from './context.js';
export { createLogger, initObservability, shutdownObservability } from './logger.js';
export { redactAddress, redactSecrets } from './redaction.js';
