import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const runContextStorage = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` merged over the surrounding log context. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return runContextStorage.run({ ...getLogContext(), ...context }, fn);
}

export function getLogContext(): LogContext {
  return runContextStorage.getStore() ?? {};
}

export function createRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Start a run: every record logged inside `fn` carries the new runId.
 */
export function withRun<T>(prefix: string, fn: (runId: string) => T): T {
  const runId = createRunId(prefix);
  return withLogContext({ runId }, () => fn(runId));
}
