#!/usr/bin/env node
/**
 * Inbox triage command-line entry point.
 *
 * Usage:
 *   inbox-triage
 *   inbox-triage --folder Support
 */

import { main } from './cli/main.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
