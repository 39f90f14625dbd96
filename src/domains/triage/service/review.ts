/**
 * @fileoverview Interactive review loop.
 *
 * Presents each ticket, lets the operator replace the draft, and sends it on
 * confirmation. The source message is marked read only after a send that
 * succeeded; declining or a delivery failure leaves it unread for a later run.
 */

import { resolveRecipient } from '../../outbound/index.js';
import { errorMessage, safeExecute } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { OperatorConsole, ReviewDeps, ReviewOutcome, ReviewSummary, Ticket } from '../types.js';

const log = createLogger({ domain: 'review' });

export const YES_NO_HINT = "Please enter 'y' or 'n'.";

/**
 * Ask until the answer is y or n (case-insensitive). There is no default.
 */
export async function askYesNo(operator: OperatorConsole, question: string): Promise<boolean> {
  for (;;) {
    const answer = (await operator.ask(question)).trim().toLowerCase();
    if (answer === 'y') return true;
    if (answer === 'n') return false;
    operator.print(YES_NO_HINT);
  }
}

export function formatTicket(ticket: Ticket, position: number): string[] {
  return [
    '',
    `=== Ticket ${position} ===`,
    `Subject: ${ticket.subject}`,
    `From: ${ticket.sender}`,
    `Urgency: ${ticket.urgency}`,
    `Reasoning: ${ticket.reasoning}`,
    `Summary: ${ticket.summary}`,
    'Proposed Response:',
    ticket.response,
    '',
  ];
}

/**
 * Walk one ticket through edit and send decisions. Mutates `ticket.response`
 * on edit and `ticket.sent` on a successful send.
 */
export async function reviewTicket(
  ticket: Ticket,
  position: number,
  deps: ReviewDeps
): Promise<ReviewOutcome> {
  const ticketLog = log.child({ emailId: ticket.emailId });
  for (const line of formatTicket(ticket, position)) {
    deps.console.print(line);
  }

  if (await askYesNo(deps.console, 'Edit response? (y/n): ')) {
    ticket.response = await deps.console.ask('Enter new response:\n');
    ticketLog.info('response_edited', { subject: ticket.subject, position });
  }

  if (!(await askYesNo(deps.console, 'Send response? (y/n): '))) {
    ticketLog.info('reply_skipped', { subject: ticket.subject });
    return 'skipped';
  }

  const to = resolveRecipient(ticket.sender);
  try {
    await deps.mailer.send(to, ticket.subject, ticket.response);
  } catch (err) {
    ticketLog.error('reply_delivery_failed', { subject: ticket.subject, to, error: errorMessage(err) });
    deps.console.print(`Error sending email: ${errorMessage(err)}`);
    return 'failed';
  }

  ticket.sent = true;
  deps.console.print(`Response sent to ${to}`);

  const marked = await safeExecute(() => deps.mailbox.markSeen(ticket.emailId), 'mark_seen', ticketLog);
  if (!marked.success) {
    deps.console.print(`Could not mark message as read: ${marked.error}`);
  }
  return 'sent';
}

/** Review tickets one at a time, in the order given. */
export async function reviewTickets(tickets: Ticket[], deps: ReviewDeps): Promise<ReviewSummary> {
  const summary: ReviewSummary = { reviewed: 0, sent: 0, skipped: 0, failed: 0 };

  for (const [index, ticket] of tickets.entries()) {
    const outcome = await reviewTicket(ticket, index + 1, deps);
    summary.reviewed += 1;
    summary[outcome] += 1;
  }

  return summary;
}
