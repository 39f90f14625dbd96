/**
 * @fileoverview Triage domain types.
 *
 * Shared types for analysis, drafting, ticket building and the review loop.
 */

import type { RemoteCallDeps } from '../../services/anthropic/index.js';
import type { MailboxSession } from '../mailbox/types.js';
import type { OutboundMailer } from '../outbound/types.js';

export const URGENCY_LEVELS = ['High', 'Medium', 'Low', 'Unknown'] as const;

export type Urgency = typeof URGENCY_LEVELS[number];

/** Classifier output. Every field is always populated. */
export type AnalysisResult = {
  urgency: Urgency;
  reasoning: string;
  summary: string;
  /** True when the fields were filled in because the call failed */
  degraded: boolean;
};

/** Drafted reply. `text` is never empty. */
export type DraftResponse = {
  text: string;
  /** True when `text` is the generic fallback */
  degraded: boolean;
};

export type Ticket = {
  emailId: string;
  subject: string;
  sender: string;
  urgency: Urgency;
  reasoning: string;
  summary: string;
  /** Replaced wholesale when the operator edits the draft */
  response: string;
  /** Flips to true once, after a successful send */
  sent: boolean;
};

/** Model settings for one kind of remote call */
export type ModelCallSettings = {
  model: string;
  maxTokens: number;
};

/** What the analysis and drafting clients need to reach the model */
export type TriageClientDeps = RemoteCallDeps & {
  analysis: ModelCallSettings;
  drafting: ModelCallSettings;
};

/** Line-oriented operator console */
export interface OperatorConsole {
  print(line: string): void;
  /** Resolves with the operator's answer; rejects with InputClosedError when input ends. */
  ask(question: string): Promise<string>;
}

export type ReviewDeps = {
  console: OperatorConsole;
  mailer: OutboundMailer;
  mailbox: Pick<MailboxSession, 'markSeen'>;
};

export type ReviewOutcome = 'sent' | 'skipped' | 'failed';

export type ReviewSummary = {
  reviewed: number;
  sent: number;
  skipped: number;
  failed: number;
};

export type TriageDeps = {
  clients: TriageClientDeps;
  console: OperatorConsole;
  mailer: OutboundMailer;
  connectMailbox: (folder: string) => Promise<MailboxSession>;
  /** Pause between messages, in ms */
  messageDelayMs: number;
  /** Body characters sent to the model per call */
  maxBodyChars: number;
  /** Overrides the pacing sleep (tests) */
  wait?: (ms: number) => Promise<void>;
  /** Checked between messages; once aborted the run stops with InputClosedError */
  signal?: AbortSignal;
};

export type TriageReport =
  | { status: 'no_unread'; tickets: Ticket[] }
  | { status: 'completed'; tickets: Ticket[]; review: ReviewSummary };
