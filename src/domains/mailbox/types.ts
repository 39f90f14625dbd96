/**
 * @fileoverview Mailbox domain types.
 *
 * RawMessage mirrors the mailbox API's MIME tree closely enough that a
 * gmail_v1.Schema$Message is assignable to it without mapping.
 */

export type MimeHeader = {
  name?: string | null;
  value?: string | null;
};

export type MimePart = {
  mimeType?: string | null;
  filename?: string | null;
  headers?: MimeHeader[] | null;
  body?: {
    /** base64url of the transfer-decoded bytes, still in the part's charset */
    data?: string | null;
  } | null;
  parts?: MimePart[] | null;
};

/** Message as delivered by the mailbox, before any interpretation. */
export type RawMessage = {
  id: string;
  payload: MimePart;
};

/** Subject, sender and plain-text body extracted from a RawMessage. */
export type NormalizedContent = Readonly<{
  subject: string;
  /** Raw From header, display name included */
  sender: string;
  body: string;
}>;

/** A connected mailbox folder. Acquire once per run, release with logout(). */
export interface MailboxSession {
  readonly folder: string;
  listUnseen(): Promise<string[]>;
  fetch(messageId: string): Promise<RawMessage>;
  markSeen(messageId: string): Promise<void>;
  logout(): Promise<void>;
}
