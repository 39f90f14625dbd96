import { describe, expect, it } from 'vitest';
import { formatTicket, reviewTicket, reviewTickets } from '../../../src/domains/triage/service/review.js';
import { buildTicket } from '../../../src/domains/triage/service/tickets.js';
import type { Ticket, Urgency } from '../../../src/domains/triage/types.js';
import { InputClosedError } from '../../../src/utils/errors.js';
import { FakeMailboxSession, RecordingMailer, ScriptedConsole } from '../../helpers/triage.js';

function ticket(emailId: string, urgency: Urgency = 'High'): Ticket {
  return buildTicket(
    emailId,
    { subject: `Subject ${emailId}`, sender: `Jane Doe <jane.${emailId}@example.com>`, body: 'body' },
    { urgency, reasoning: 'Looks urgent', summary: 'Something broke.', degraded: false },
    { text: 'Draft reply', degraded: false }
  );
}

function setup(answers: string[]) {
  const console = new ScriptedConsole(answers);
  const mailer = new RecordingMailer();
  const mailbox = new FakeMailboxSession('inbox', []);
  return { console, mailer, mailbox, deps: { console, mailer, mailbox } };
}

describe('formatTicket', () => {
  it('lays out every ticket field', () => {
    expect(formatTicket(ticket('m1'), 2)).toEqual([
      '',
      '=== Ticket 2 ===',
      'Subject: Subject m1',
      'From: Jane Doe <jane.m1@example.com>',
      'Urgency: High',
      'Reasoning: Looks urgent',
      'Summary: Something broke.',
      'Proposed Response:',
      'Draft reply',
      '',
    ]);
  });
});

describe('reviewTicket', () => {
  it('sends the draft and marks the message read', async () => {
    const { deps, console, mailer, mailbox } = setup(['n', 'y']);
    const current = ticket('m1');

    const outcome = await reviewTicket(current, 1, deps);

    expect(outcome).toBe('sent');
    expect(current.sent).toBe(true);
    expect(mailer.sent).toEqual([{ to: 'jane.m1@example.com', subject: 'Subject m1', body: 'Draft reply' }]);
    expect(mailbox.seen).toEqual(['m1']);
    expect(console.asked).toEqual(['Edit response? (y/n): ', 'Send response? (y/n): ']);
    expect(console.printed).toContain('Response sent to jane.m1@example.com');
  });

  it('replaces the draft on edit and leaves the message unread when declined', async () => {
    const { deps, mailer, mailbox } = setup(['y', 'Thanks, fixed now.', 'n']);
    const current = ticket('m1');

    const outcome = await reviewTicket(current, 1, deps);

    expect(outcome).toBe('skipped');
    expect(current.response).toBe('Thanks, fixed now.');
    expect(current.sent).toBe(false);
    expect(mailer.sent).toEqual([]);
    expect(mailbox.seen).toEqual([]);
  });

  it('sends the edited text', async () => {
    const { deps, mailer } = setup(['Y', 'Edited', ' y ']);

    await reviewTicket(ticket('m1'), 1, deps);

    expect(mailer.sent.map((mail) => mail.body)).toEqual(['Edited']);
  });

  it('re-prompts until it gets y or n', async () => {
    const { deps, console } = setup(['maybe', '', 'n', 'yes', 'n']);

    const outcome = await reviewTicket(ticket('m1'), 1, deps);

    expect(outcome).toBe('skipped');
    expect(console.printed.filter((line) => line === "Please enter 'y' or 'n'.")).toHaveLength(3);
    expect(console.asked).toEqual([
      'Edit response? (y/n): ',
      'Edit response? (y/n): ',
      'Edit response? (y/n): ',
      'Send response? (y/n): ',
      'Send response? (y/n): ',
    ]);
  });

  it('keeps the message unread when delivery fails', async () => {
    const { deps, console, mailer, mailbox } = setup(['n', 'y']);
    mailer.failWith = 'SMTP unavailable';
    const current = ticket('m1');

    const outcome = await reviewTicket(current, 1, deps);

    expect(outcome).toBe('failed');
    expect(current.sent).toBe(false);
    expect(mailbox.seen).toEqual([]);
    expect(console.printed).toContain('Error sending email: SMTP unavailable');
  });

  it('still counts the send when marking read fails', async () => {
    const { deps, console, mailbox } = setup(['n', 'y']);
    mailbox.failMarkSeen = true;
    const current = ticket('m1');

    const outcome = await reviewTicket(current, 1, deps);

    expect(outcome).toBe('sent');
    expect(current.sent).toBe(true);
    expect(console.printed).toContain('Could not mark message as read: modify failed');
  });

  it('uses the raw sender when it has no address', async () => {
    const { deps, mailer } = setup(['n', 'y']);
    const current = { ...ticket('m1'), sender: 'Undisclosed recipients' };

    await reviewTicket(current, 1, deps);

    expect(mailer.sent[0].to).toBe('Undisclosed recipients');
  });
});

describe('reviewTickets', () => {
  it('reviews in the given order and tallies outcomes', async () => {
    const { deps, console, mailer } = setup(['n', 'y', 'n', 'n', 'n', 'y']);
    const tickets = [ticket('m1'), ticket('m2', 'Low'), ticket('m3', 'Unknown')];

    const summary = await reviewTickets(tickets, deps);

    expect(summary).toEqual({ reviewed: 3, sent: 2, skipped: 1, failed: 0 });
    expect(mailer.sent.map((mail) => mail.to)).toEqual(['jane.m1@example.com', 'jane.m3@example.com']);
    expect(console.printed.filter((line) => line.startsWith('=== Ticket'))).toEqual([
      '=== Ticket 1 ===',
      '=== Ticket 2 ===',
      '=== Ticket 3 ===',
    ]);
  });

  it('returns zero counts for no tickets', async () => {
    const { deps } = setup([]);
    await expect(reviewTickets([], deps)).resolves.toEqual({ reviewed: 0, sent: 0, skipped: 0, failed: 0 });
  });

  it('stops when operator input closes', async () => {
    const { deps, mailer } = setup(['n']);

    await expect(reviewTickets([ticket('m1'), ticket('m2')], deps)).rejects.toBeInstanceOf(InputClosedError);
    expect(mailer.sent).toEqual([]);
  });
});
