export { SmtpMailer, createSmtpMailer, createSmtpTransport, replySubject, resolveRecipient } from './providers/smtp.js';
export type * from './types.js';
