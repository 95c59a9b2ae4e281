/**
 * Label Extractor
 * Reads Gmail labels (X-Gmail-Labels) plus Date and Message-ID from the
 * header block of a raw message.
 */

import { simpleParser } from 'mailparser';
import { DomainErrorContext, ParsingError, errorMessage } from '../errors';

export const LABEL_HEADER = 'x-gmail-labels';

export interface MessageHeaders {
  /** Labels in header order, first occurrence kept */
  labels: string[];
  date?: Date;
  messageId?: string;
}

const HEADER_LINE = /^[!-9;-~]+:/;
const LABEL_LINE = new RegExp(`^${LABEL_HEADER}[ \\t]*:`, 'i');
const FOLDED_LINE_BREAK = /\r?\n(?=[ \t])/g;
const ENCODED_WORD_RUN =
  /=\?[^?\s]+\?[BbQq]\?[^?\s]*\?=(?:[ \t]+=\?[^?\s]+\?[BbQq]\?[^?\s]*\?=)*/g;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Split a label header value on commas. Commas inside double quotes do not
 * split, and a backslash escapes the next character inside quotes.
 */
export function splitLabelHeader(value: string): string[] {
  const labels: string[] = [];
  let current = '';
  let inQuotes = false;
  let escaped = false;

  const flush = () => {
    const label = current.trim();
    if (label) {
      labels.push(label);
    }
    current = '';
  };

  for (const char of value) {
    if (escaped) {
      current += char;
      escaped = false;
    } else if (inQuotes && char === '\\') {
      escaped = true;
    } else if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      flush();
    } else {
      current += char;
    }
  }
  flush();

  return labels;
}

/**
 * Bytes up to (not including) the first blank line, or the whole buffer when
 * the message has no body.
 */
export function headerBlock(content: Buffer): Buffer {
  const lf = content.indexOf('\n\n');
  const crlf = content.indexOf('\r\n\r\n');
  const ends = [lf >= 0 ? lf + 1 : -1, crlf >= 0 ? crlf + 2 : -1].filter((end) => end > 0);
  if (ends.length === 0) {
    return content;
  }
  return content.subarray(0, Math.min(...ends));
}

/**
 * Raw 8-bit header bytes: UTF-8 when they form valid UTF-8, latin1 otherwise.
 */
export function decodeHeaderBytes(bytes: Buffer): string {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

/**
 * Unfolded, charset-decoded values of every X-Gmail-Labels line in a header
 * block.
 */
export function labelHeaderValues(block: Buffer): string[] {
  return block
    .toString('latin1')
    .replace(FOLDED_LINE_BREAK, '')
    .split(/\r?\n/)
    .filter((line) => LABEL_LINE.test(line))
    .map((line) => decodeHeaderBytes(Buffer.from(line.slice(line.indexOf(':') + 1), 'latin1')).trim());
}

/**
 * Decode RFC 2047 encoded words by letting mailparser read each run of them
 * as a Subject header. Text around the runs is left as it is.
 */
async function decodeEncodedWords(value: string): Promise<string> {
  if (!value.includes('=?')) {
    return value;
  }
  let decoded = '';
  let last = 0;
  for (const match of value.matchAll(ENCODED_WORD_RUN)) {
    const start = match.index ?? last;
    const parsed = await simpleParser(`Subject: ${match[0]}\r\n\r\n`);
    decoded += value.slice(last, start) + (parsed.subject ?? match[0]);
    last = start + match[0].length;
  }
  return decoded + value.slice(last);
}

export async function readMessageHeaders(
  content: Buffer,
  context: DomainErrorContext = {}
): Promise<MessageHeaders> {
  const block = headerBlock(content);
  if (!HEADER_LINE.test(block.toString('latin1', 0, Math.min(block.length, 1000)))) {
    throw ParsingError.malformedEntry('no header block', context);
  }

  try {
    const parsed = await simpleParser(block);

    const labels: string[] = [];
    for (const raw of labelHeaderValues(block)) {
      const decoded = await decodeEncodedWords(raw);
      for (const label of splitLabelHeader(decoded)) {
        if (!labels.includes(label)) {
          labels.push(label);
        }
      }
    }

    const date =
      parsed.headers.has('date') && parsed.date && !Number.isNaN(parsed.date.getTime())
        ? parsed.date
        : undefined;

    return { labels, date, messageId: parsed.messageId };
  } catch (error) {
    throw ParsingError.unreadableHeaders(
      error instanceof Error ? error : new Error(errorMessage(error)),
      context
    );
  }
}
