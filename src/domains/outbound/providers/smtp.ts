/**
 * @fileoverview SMTP outbound mailer (nodemailer).
 */

import nodemailer from 'nodemailer';
import addressparser from 'nodemailer/lib/addressparser/index.js';
import type { TriageConfig } from '../../../config.js';
import { ConfigError, DeliveryError, errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { MailTransport, OutboundMailer } from '../types.js';

const log = createLogger({ domain: 'outbound' });

/** Reply subject: the original subject prefixed with "Re: ". */
export function replySubject(subject: string): string {
  return `Re: ${subject}`;
}

function firstUsableAddress(entries: unknown[]): string | undefined {
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) continue;
    if ('address' in entry && typeof entry.address === 'string' && entry.address.includes('@')) {
      return entry.address;
    }
    if ('group' in entry && Array.isArray(entry.group)) {
      const nested = firstUsableAddress(entry.group);
      if (nested) return nested;
    }
  }
  return undefined;
}

/**
 * Bare address from a From header value ("Jane <jane@example.com>" →
 * "jane@example.com"). Falls back to the raw value when nothing in it
 * looks like an address.
 */
export function resolveRecipient(sender: string): string {
  return firstUsableAddress(addressparser(sender)) ?? sender;
}

export class SmtpMailer implements OutboundMailer {
  constructor(
    private readonly transport: MailTransport,
    private readonly from: string
  ) {}

  async send(to: string, subject: string, body: string): Promise<void> {
    try {
      await this.transport.sendMail({
        from: this.from,
        to,
        subject: replySubject(subject),
        text: body,
      });
    } catch (err) {
      log.error('delivery_failed', { to, subject, error: errorMessage(err) });
      throw new DeliveryError(`Could not deliver reply to ${to}: ${errorMessage(err)}`, { to });
    }
    log.info('reply_sent', { to, subject });
  }
}

/**
 * Build the SMTP transport: STARTTLS on 587, implicit TLS on 465.
 * Authenticates with the app password when one is configured, otherwise
 * with the same Google OAuth2 credentials the mailbox uses.
 */
export function createSmtpTransport(config: TriageConfig): MailTransport {
  const user = config.email.address;
  if (!user) {
    throw new ConfigError(['EMAIL_ADDRESS is required']);
  }

  const secure = config.smtp.port === 465;
  const auth = config.smtp.password
    ? { user, pass: config.smtp.password }
    : {
        type: 'OAuth2' as const,
        user,
        clientId: config.google.clientId,
        clientSecret: config.google.clientSecret,
        refreshToken: config.google.refreshToken,
      };

  return nodemailer.createTransport({
    host: config.smtp.host,
    port: config.smtp.port,
    secure,
    requireTLS: !secure,
    auth,
  });
}

export function createSmtpMailer(config: TriageConfig): SmtpMailer {
  return new SmtpMailer(createSmtpTransport(config), config.email.address ?? '');
}
