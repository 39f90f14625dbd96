/**
 * @fileoverview Gmail mailbox session.
 *
 * Connects to one folder (a Gmail label) with the configured OAuth
 * credentials and exposes the operations a triage run needs: list unread,
 * fetch, mark read, log out.
 */

import { google, type gmail_v1 } from 'googleapis';
import type { TriageConfig } from '../../../config.js';
import { ConnectionError, errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { MailboxSession, RawMessage } from '../types.js';

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

const log = createLogger({ domain: 'mailbox' });

/**
 * Resolve a folder name to a label ID, matching ID or display name
 * case-insensitively ("inbox" → "INBOX").
 */
async function resolveLabelId(gmail: gmail_v1.Gmail, folder: string): Promise<string> {
  const response = await gmail.users.labels.list({ userId: 'me' });
  const wanted = folder.toLowerCase();
  const match = (response.data.labels ?? []).find(
    label => label.id?.toLowerCase() === wanted || label.name?.toLowerCase() === wanted
  );
  if (!match?.id) {
    throw new ConnectionError(`Mailbox folder not found: ${folder}`, { folder });
  }
  return match.id;
}

class GmailMailboxSession implements MailboxSession {
  private closed = false;

  constructor(
    private readonly gmail: gmail_v1.Gmail,
    private readonly auth: OAuth2Client,
    readonly folder: string,
    private readonly labelId: string
  ) {}

  private ensureOpen(): void {
    if (this.closed) {
      throw new ConnectionError('Mailbox session is closed', { folder: this.folder });
    }
  }

  async listUnseen(): Promise<string[]> {
    this.ensureOpen();
    const ids = new Set<string>();
    let pageToken: string | undefined;

    do {
      const response = await this.gmail.users.messages.list({
        userId: 'me',
        labelIds: [this.labelId, 'UNREAD'],
        pageToken,
      });

      for (const message of response.data.messages ?? []) {
        if (message.id) {
          ids.add(message.id);
        }
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return [...ids];
  }

  async fetch(messageId: string): Promise<RawMessage> {
    this.ensureOpen();
    const response = await this.gmail.users.messages.get({
      userId: 'me',
      id: messageId,
      format: 'full',
    });
    return {
      id: response.data.id ?? messageId,
      payload: response.data.payload ?? {},
    };
  }

  async markSeen(messageId: string): Promise<void> {
    this.ensureOpen();
    await this.gmail.users.messages.modify({
      userId: 'me',
      id: messageId,
      requestBody: { removeLabelIds: ['UNREAD'] },
    });
    log.info('message_marked_read', { messageId });
  }

  async logout(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.auth.setCredentials({});
    log.info('mailbox_disconnected', { folder: this.folder });
  }
}

/**
 * Open a session on `folder`.
 *
 * @throws ConnectionError when credentials are missing, the API cannot be
 * reached, or the folder does not exist
 */
export async function connectGmailMailbox(
  config: TriageConfig,
  folder: string
): Promise<MailboxSession> {
  const { clientId, clientSecret, refreshToken } = config.google;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new ConnectionError('Google OAuth credentials are not configured', { folder });
  }

  const auth = new google.auth.OAuth2(clientId, clientSecret);
  auth.setCredentials({ refresh_token: refreshToken });
  const gmail = google.gmail({ version: 'v1', auth });

  let labelId: string;
  try {
    labelId = await resolveLabelId(gmail, folder);
  } catch (err) {
    if (err instanceof ConnectionError) throw err;
    throw new ConnectionError(`Could not connect to mailbox: ${errorMessage(err)}`, { folder });
  }

  log.info('mailbox_connected', { folder, labelId });
  return new GmailMailboxSession(gmail, auth, folder, labelId);
}
