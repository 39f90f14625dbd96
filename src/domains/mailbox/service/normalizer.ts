/**
 * @fileoverview Content normalizer.
 *
 * Turns a RawMessage into subject, sender and plain-text body. Pure and
 * deterministic: normalizing the same message twice gives equal results.
 */

import type { MimePart, NormalizedContent, RawMessage } from '../types.js';
import {
  cleanHtml,
  decodeMimeWords,
  decodePartBody,
  getHeader,
  getMimeType,
  normalizeWhitespace,
} from './mime.js';

function isMultipart(part: MimePart): boolean {
  return (part.parts?.length ?? 0) > 0 || getMimeType(part).startsWith('multipart/');
}

function isAttachment(part: MimePart): boolean {
  return Boolean(part.filename);
}

function* walkParts(part: MimePart): Generator<MimePart> {
  yield part;
  for (const child of part.parts ?? []) {
    yield* walkParts(child);
  }
}

/**
 * Pick the body text of a message.
 *
 * Multi-part: the first text/plain part in declaration order wins outright;
 * without one, the last text/html part is used, cleaned to text. Parts
 * that carry a filename are attachments and are skipped, even a text/plain
 * one, so an attached .txt never becomes the body.
 * Single-part: the body itself if it is text/plain or text/html.
 * Anything else yields ''.
 */
export function selectBody(payload: MimePart): string {
  if (!isMultipart(payload)) {
    const type = getMimeType(payload);
    if (type === 'text/plain') return normalizeWhitespace(decodePartBody(payload));
    if (type === 'text/html') return cleanHtml(decodePartBody(payload));
    return '';
  }

  let htmlBody: string | undefined;
  for (const part of walkParts(payload)) {
    if (isAttachment(part)) continue;

    const type = getMimeType(part);
    if (type === 'text/plain') {
      return normalizeWhitespace(decodePartBody(part));
    }
    if (type === 'text/html') {
      htmlBody = cleanHtml(decodePartBody(part));
    }
  }

  return htmlBody ?? '';
}

export function normalizeMessage(raw: RawMessage): NormalizedContent {
  return {
    subject: decodeMimeWords(getHeader(raw.payload, 'Subject')).trim(),
    sender: getHeader(raw.payload, 'From'),
    body: selectBody(raw.payload),
  };
}
