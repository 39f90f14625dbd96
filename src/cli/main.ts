/**
 * @fileoverview Triage CLI wiring.
 *
 * Loads configuration, builds the run's collaborators from it, and maps the
 * run's outcome to a process exit code.
 */

import { loadConfig, validateConfig } from '../config.js';
import { connectGmailMailbox } from '../domains/mailbox/index.js';
import { createSmtpMailer } from '../domains/outbound/index.js';
import { ReadlineConsole, runTriage } from '../domains/triage/runtime/index.js';
import type { OperatorConsole, TriageDeps } from '../domains/triage/types.js';
import { createModelClient } from '../services/anthropic/index.js';
import { ConfigError, ConnectionError, InputClosedError, errorMessage } from '../utils/errors.js';
import { createLogger, initObservability, shutdownObservability } from '../utils/observability/index.js';
import { USAGE, parseArgs } from './args.js';

const log = createLogger({ domain: 'cli' });

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

/** Operator console the run talks to; closed when the run ends. */
export type ClosableConsole = OperatorConsole & { close(): void; readonly signal?: AbortSignal };

const processIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Run the CLI once and resolve with the exit code.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
  io: CliIo = processIo,
  openConsole: () => ClosableConsole = () => new ReadlineConsole()
): Promise<number> {
  const config = loadConfig(env);
  const parsed = parseArgs(argv, config.triage.defaultFolder);
  if (!parsed.ok) {
    io.err(`Error: ${parsed.error}`);
    io.err(USAGE);
    return EXIT_FAILURE;
  }
  if (parsed.options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  try {
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.err(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }

  initObservability(config.log);
  const clients: TriageDeps['clients'] = {
    client: createModelClient(config),
    policy: {
      maxAttempts: config.llm.maxAttempts,
      baseDelayMs: config.llm.retryBaseDelayMs,
      retryableStatuses: config.llm.retryableStatuses,
    },
    analysis: { model: config.models.analysis, maxTokens: config.llm.analysisMaxTokens },
    drafting: { model: config.models.drafting, maxTokens: config.llm.draftingMaxTokens },
  };
  const mailer = createSmtpMailer(config);
  const operator = openConsole();

  const deps: TriageDeps = {
    clients,
    console: operator,
    mailer,
    connectMailbox: (folder) => connectGmailMailbox(config, folder),
    messageDelayMs: config.triage.messageDelayMs,
    maxBodyChars: config.triage.maxBodyChars,
    signal: operator.signal,
  };

  try {
    const report = await runTriage({ folder: parsed.options.folder }, deps);
    if (report.status === 'completed') {
      const { reviewed, sent, skipped, failed } = report.review;
      io.out(`Reviewed ${reviewed} ticket(s): ${sent} sent, ${skipped} skipped, ${failed} failed.`);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConnectionError) {
      log.error('mailbox_connection_failed', { folder: parsed.options.folder, error: err.message });
      io.err(`Error connecting to email: ${err.message}`);
      return EXIT_FAILURE;
    }
    if (err instanceof InputClosedError) {
      log.warn('review_aborted', { error: err.message });
      io.err('Input closed; stopping review.');
      return EXIT_FAILURE;
    }
    log.error('run_failed', { error: errorMessage(err) });
    throw err;
  } finally {
    operator.close();
    await shutdownObservability();
  }
}
