/**
 * @fileoverview Mailbox domain public API.
 */

export { connectGmailMailbox } from './providers/gmail.js';
export { normalizeMessage, selectBody } from './service/normalizer.js';
export { cleanHtml, decodeMimeWords } from './service/mime.js';
export type * from './types.js';
