/**
 * @fileoverview Outbound mail types.
 */

import type Mail from 'nodemailer/lib/mailer/index.js';

/** Delivers a reply. Rejects with DeliveryError when the mail cannot be sent. */
export interface OutboundMailer {
  send(to: string, subject: string, body: string): Promise<void>;
}

/** The part of a nodemailer transporter the mailer uses. */
export interface MailTransport {
  sendMail(mail: Mail.Options): Promise<unknown>;
}
