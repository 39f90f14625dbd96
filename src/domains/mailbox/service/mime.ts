/**
 * @fileoverview MIME helpers: header lookup, part decoding, encoded words
 * and HTML-to-text cleanup.
 */

import type { MimePart } from '../types.js';

const ENCODED_WORD_PATTERN = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

/**
 * Case-insensitive header lookup. Returns '' when the header is absent.
 */
export function getHeader(part: MimePart, name: string): string {
  const wanted = name.toLowerCase();
  const header = (part.headers ?? []).find(h => h.name?.toLowerCase() === wanted);
  return header?.value ?? '';
}

/** Lowercased media type, from the part itself or its Content-Type header. */
export function getMimeType(part: MimePart): string {
  const declared = part.mimeType || getHeader(part, 'Content-Type').split(';')[0];
  return declared.trim().toLowerCase();
}

export function getCharset(part: MimePart): string | undefined {
  const match = getHeader(part, 'Content-Type').match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1];
}

/**
 * Decode bytes in the given charset. Invalid sequences become U+FFFD;
 * an unknown charset falls back to UTF-8.
 */
export function decodeBytes(bytes: Uint8Array, charset?: string): string {
  try {
    return new TextDecoder(charset ?? 'utf-8').decode(bytes);
  } catch {
    return new TextDecoder('utf-8').decode(bytes);
  }
}

/**
 * Decode a part's base64url body data into text using its declared charset.
 */
export function decodePartBody(part: MimePart): string {
  const data = part.body?.data;
  if (!data) return '';
  return decodeBytes(Buffer.from(data, 'base64url'), getCharset(part));
}

function decodeQuotedWord(text: string): Uint8Array {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const hex = text.slice(i + 1, i + 3);
    if (ch === '_') {
      bytes.push(0x20);
    } else if (ch === '=' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(ch, 'utf-8'));
    }
  }
  return Uint8Array.from(bytes);
}

function decodeEncodedWord(charset: string, encoding: string, text: string): string | undefined {
  // RFC 2231 allows a language suffix: utf-8*en
  const label = charset.split('*')[0];
  const bytes = encoding.toUpperCase() === 'B'
    ? Buffer.from(text, 'base64')
    : decodeQuotedWord(text);
  try {
    return new TextDecoder(label).decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Decode RFC 2047 encoded words in a header value.
 * Words that cannot be decoded are left as they are.
 */
export function decodeMimeWords(value: string): string {
  // Whitespace between two adjacent encoded words is not part of the text
  const joined = value.replace(/(\?=)\s+(?==\?)/g, '$1');
  return joined.replace(
    ENCODED_WORD_PATTERN,
    (word: string, charset: string, encoding: string, text: string) =>
      decodeEncodedWord(charset, encoding, text) ?? word
  );
}

function fromCodePoint(code: number): string {
  return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : ' ';
}

/**
 * Reduce HTML to plain text: markup dropped, common entities decoded,
 * every whitespace run collapsed to a single space.
 */
export function cleanHtml(html: string): string {
  if (!html) return '';

  return html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ' ')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&#(\d+);/g, (_match: string, code: string) => fromCodePoint(parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_match: string, code: string) => fromCodePoint(parseInt(code, 16)))
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&(#39|apos);/gi, "'")
    .replace(/&amp;/gi, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Collapse runs of whitespace into single spaces/newlines.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
