/**
 * Test doubles for the triage run: model client deps, a scripted operator
 * console, an in-memory mailbox session and a recording mailer.
 */

import { mockCreate } from '../mocks/anthropic.js';
import type { MailboxSession, MimePart, RawMessage } from '../../src/domains/mailbox/types.js';
import type { OutboundMailer } from '../../src/domains/outbound/types.js';
import type { OperatorConsole, TriageClientDeps } from '../../src/domains/triage/types.js';
import { DeliveryError, InputClosedError } from '../../src/utils/errors.js';

export const noWait = async (_ms: number): Promise<void> => undefined;

/**
 * Client deps backed by the mocked SDK's messages.create.
 */
export function mockClientDeps(): TriageClientDeps {
  return {
    client: { messages: { create: mockCreate } },
    policy: { maxAttempts: 3, baseDelayMs: 1000, retryableStatuses: [502, 503, 504] },
    wait: noWait,
    analysis: { model: 'analysis-model', maxTokens: 500 },
    drafting: { model: 'drafting-model', maxTokens: 300 },
  };
}

/**
 * Console that answers from a script and records everything printed.
 * Running out of answers behaves like closed input.
 */
export class ScriptedConsole implements OperatorConsole {
  readonly printed: string[] = [];
  readonly asked: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  print(line: string): void {
    this.printed.push(line);
  }

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new InputClosedError();
    }
    return answer;
  }
}

export interface SentMail {
  to: string;
  subject: string;
  body: string;
}

export class RecordingMailer implements OutboundMailer {
  readonly sent: SentMail[] = [];
  failWith: string | null = null;

  async send(to: string, subject: string, body: string): Promise<void> {
    if (this.failWith) {
      throw new DeliveryError(this.failWith, { to });
    }
    this.sent.push({ to, subject, body });
  }
}

export interface StoredMessage {
  id: string;
  subject: string;
  from: string;
  payload: MimePart;
  unread: boolean;
}

export function plainPayload(text: string): MimePart {
  return { mimeType: 'text/plain', body: { data: Buffer.from(text).toString('base64url') } };
}

export function storedMessage(id: string, subject: string, from: string, body: string): StoredMessage {
  return { id, subject, from, payload: plainPayload(body), unread: true };
}

/**
 * Mailbox session over an in-memory list of messages.
 */
export class FakeMailboxSession implements MailboxSession {
  logoutCount = 0;
  readonly seen: string[] = [];
  failFetch = new Set<string>();
  failMarkSeen = false;
  failList: Error | null = null;

  constructor(
    readonly folder: string,
    readonly messages: StoredMessage[]
  ) {}

  async listUnseen(): Promise<string[]> {
    if (this.failList) throw this.failList;
    return this.messages.filter((message) => message.unread).map((message) => message.id);
  }

  async fetch(messageId: string): Promise<RawMessage> {
    const message = this.messages.find((candidate) => candidate.id === messageId);
    if (!message || this.failFetch.has(messageId)) {
      throw new Error(`No such message: ${messageId}`);
    }
    return {
      id: message.id,
      payload: {
        ...message.payload,
        headers: [
          { name: 'Subject', value: message.subject },
          { name: 'From', value: message.from },
        ],
      },
    };
  }

  async markSeen(messageId: string): Promise<void> {
    if (this.failMarkSeen) throw new Error('modify failed');
    this.seen.push(messageId);
    const message = this.messages.find((candidate) => candidate.id === messageId);
    if (message) message.unread = false;
  }

  async logout(): Promise<void> {
    this.logoutCount += 1;
  }
}
