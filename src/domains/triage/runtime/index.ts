/**
 * @fileoverview Triage run lifecycle.
 *
 * Connects to the mailbox once, turns every unread message into a ticket
 * (in server order), sorts the batch by urgency, runs the review loop, and
 * logs out exactly once whatever happens after the connection is made.
 */

import { normalizeMessage } from '../../mailbox/index.js';
import type { MailboxSession, NormalizedContent } from '../../mailbox/types.js';
import { ConnectionError, InputClosedError, errorMessage } from '../../../utils/errors.js';
import { sleep } from '../../../utils/retry.js';
import { createLogger, withRun } from '../../../utils/observability/index.js';
import { UNAVAILABLE_SUMMARY, analyzeEmail } from '../service/analysis.js';
import { FALLBACK_REPLY, draftReply } from '../service/drafting.js';
import { reviewTickets } from '../service/review.js';
import { buildTicket, sortTickets } from '../service/tickets.js';
import type { Ticket, TriageDeps, TriageReport } from '../types.js';

// Re-export domain public API
export { analyzeEmail, failedAnalysis, parseUrgency, unparseableAnalysis } from '../service/analysis.js';
export { draftReply, FALLBACK_REPLY } from '../service/drafting.js';
export { buildTicket, sortTickets, URGENCY_RANK } from '../service/tickets.js';
export { askYesNo, formatTicket, reviewTicket, reviewTickets } from '../service/review.js';
export { ReadlineConsole } from '../providers/console.js';
export type * from '../types.js';

const log = createLogger({ domain: 'triage-runtime' });

export const NO_UNREAD_MESSAGE = 'No unread emails found.';

function unavailableTicket(messageId: string, cause: string): Ticket {
  const content: NormalizedContent = { subject: '(unavailable)', sender: '', body: '' };
  return buildTicket(
    messageId,
    content,
    {
      urgency: 'Unknown',
      reasoning: `message could not be fetched: ${cause}`,
      summary: UNAVAILABLE_SUMMARY,
      degraded: true,
    },
    { text: FALLBACK_REPLY, degraded: true }
  );
}

/**
 * Build the ticket for one message. Never rejects: a message that cannot be
 * fetched still yields a degraded ticket so nothing is dropped.
 */
async function buildTicketForMessage(
  session: MailboxSession,
  messageId: string,
  deps: TriageDeps
): Promise<Ticket> {
  let content: NormalizedContent;
  try {
    content = normalizeMessage(await session.fetch(messageId));
  } catch (err) {
    log.error('message_fetch_failed', { messageId, error: errorMessage(err) });
    deps.console.print(`Error fetching message ${messageId}: ${errorMessage(err)}`);
    return unavailableTicket(messageId, errorMessage(err));
  }

  const body = content.body.slice(0, deps.maxBodyChars);
  const analysis = await analyzeEmail(deps.clients, content.subject, body);
  if (analysis.degraded) {
    deps.console.print(`Analysis unavailable for "${content.subject}": ${analysis.reasoning}`);
  }

  const draft = await draftReply(deps.clients, content.subject, body);
  if (draft.degraded) {
    deps.console.print(`Draft unavailable for "${content.subject}"; using the generic reply.`);
  }

  return buildTicket(messageId, content, analysis, draft);
}

async function listUnseen(session: MailboxSession): Promise<string[]> {
  try {
    return await session.listUnseen();
  } catch (err) {
    if (err instanceof ConnectionError) throw err;
    throw new ConnectionError(`Could not list unread messages: ${errorMessage(err)}`, {
      folder: session.folder,
    });
  }
}

function stopIfInterrupted(deps: TriageDeps, folder: string, processed: number): void {
  if (deps.signal?.aborted) {
    log.warn('run_interrupted', { folder, processed });
    throw new InputClosedError();
  }
}

async function processSession(session: MailboxSession, deps: TriageDeps): Promise<TriageReport> {
  const messageIds = await listUnseen(session);
  if (messageIds.length === 0) {
    log.info('no_unread_messages', { folder: session.folder });
    deps.console.print(NO_UNREAD_MESSAGE);
    return { status: 'no_unread', tickets: [] };
  }

  log.info('run_started', { folder: session.folder, unread: messageIds.length });
  const wait = deps.wait ?? sleep;

  const tickets: Ticket[] = [];
  for (const [index, messageId] of messageIds.entries()) {
    stopIfInterrupted(deps, session.folder, index);
    if (index > 0 && deps.messageDelayMs > 0) {
      await wait(deps.messageDelayMs);
    }
    stopIfInterrupted(deps, session.folder, index);
    tickets.push(await buildTicketForMessage(session, messageId, deps));
  }

  stopIfInterrupted(deps, session.folder, tickets.length);
  const sorted = sortTickets(tickets);
  deps.console.print(`Built ${sorted.length} ticket(s).`);

  const review = await reviewTickets(sorted, {
    console: deps.console,
    mailer: deps.mailer,
    mailbox: session,
  });

  log.info('run_completed', { folder: session.folder, tickets: sorted.length, ...review });
  return { status: 'completed', tickets: sorted, review };
}

/**
 * Run one triage pass over `folder`.
 *
 * @throws ConnectionError when the mailbox cannot be opened or listed
 * @throws InputClosedError when operator input ends mid-review or `deps.signal` aborts
 */
export async function runTriage(
  options: { folder: string },
  deps: TriageDeps
): Promise<TriageReport> {
  return withRun('triage', async (runId) => {
    log.info('run_opened', { runId, folder: options.folder });
    const session = await deps.connectMailbox(options.folder);
    try {
      return await processSession(session, deps);
    } finally {
      try {
        await session.logout();
      } catch (err) {
        log.error('logout_failed', { folder: session.folder, error: errorMessage(err) });
      }
    }
  });
}
