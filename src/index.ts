/**
 * @fileoverview Inbox triage library entry point.
 *
 * The CLI in ./cli.ts is the usual way in; these exports let the run be
 * embedded with other consoles, mailers or mailbox sessions.
 */

export { loadConfig, validateConfig, type TriageConfig } from './config.js';
export { main } from './cli/main.js';
export { parseArgs, USAGE, type CliOptions } from './cli/args.js';
export { connectGmailMailbox, normalizeMessage, selectBody, cleanHtml, decodeMimeWords } from './domains/mailbox/index.js';
export type { MailboxSession, NormalizedContent, RawMessage } from './domains/mailbox/index.js';
export { createSmtpMailer, createSmtpTransport, replySubject, resolveRecipient, SmtpMailer } from './domains/outbound/index.js';
export type { OutboundMailer } from './domains/outbound/index.js';
export {
  analyzeEmail,
  draftReply,
  buildTicket,
  sortTickets,
  reviewTickets,
  runTriage,
  ReadlineConsole,
  FALLBACK_REPLY,
  URGENCY_RANK,
} from './domains/triage/runtime/index.js';
export type { Ticket, Urgency, AnalysisResult, DraftResponse, TriageDeps, TriageReport } from './domains/triage/runtime/index.js';
export { createModelClient, callModel } from './services/anthropic/index.js';
export {
  AppError,
  ConfigError,
  ConnectionError,
  DeliveryError,
  InputClosedError,
  MalformedServiceResponseError,
  ServiceCallError,
} from './utils/errors.js';
