/**
 * Mbox Reader
 * Streams raw entries out of an mbox file without loading it into memory.
 * Lines are read as latin1 so every byte maps to one character and back.
 * Only LF ends a line; a CR directly before it is dropped, any other CR is
 * message content.
 */

import { createReadStream } from 'fs';
import logger from '../utils/logger';

export interface MboxEntry {
  /** Zero-based position of the entry in the file */
  index: number;
  /** Offset of the entry's separator line */
  offset: number;
  /** The `From ` separator line itself */
  fromLine: string;
  /** Entry bytes without the separator line */
  content: Buffer;
}

export interface MboxReaderOptions {
  bufferSizeKb?: number;
}

/**
 * Whether a line starts a new message. `>From ` and `From:` never do. A line
 * carrying a sender plus a year and a time is always a separator; a bare
 * `From <sender>` only counts after a blank line.
 */
export function isMboxDelimiterLine(line: string, previousLineWasEmpty: boolean): boolean {
  if (!line.startsWith('From ')) {
    return false;
  }

  const parts = line.split(' ');
  const hasYear = /\d{4}/.test(line);
  const hasTime = /\d{1,2}:\d{2}/.test(line);

  if (parts.length >= 3 && hasYear && hasTime) {
    return true;
  }

  return previousLineWasEmpty && parts.length >= 2 && parts[1].trim() !== '';
}

interface PendingEntry {
  offset: number;
  fromLine: string;
  lines: string[];
}

function toEntry(index: number, pending: PendingEntry): MboxEntry {
  const { lines } = pending;
  // The blank line before the next separator belongs to the mbox framing
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  const text = lines.length > 0 ? `${lines.join('\n')}\n` : '';
  return {
    index,
    offset: pending.offset,
    fromLine: pending.fromLine,
    content: Buffer.from(text, 'latin1'),
  };
}

interface RawLine {
  text: string;
  /** Bytes the line occupied on disk, terminator included */
  size: number;
}

async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<RawLine, void, undefined> {
  let remainder = '';
  for await (const chunk of chunks) {
    remainder += chunk;
    let start = 0;
    let end = remainder.indexOf('\n', start);
    while (end >= 0) {
      const text = remainder.slice(start, end);
      yield { text: text.endsWith('\r') ? text.slice(0, -1) : text, size: text.length + 1 };
      start = end + 1;
      end = remainder.indexOf('\n', start);
    }
    remainder = remainder.slice(start);
  }
  if (remainder.length > 0) {
    yield { text: remainder, size: remainder.length };
  }
}

export async function* readMboxEntries(
  filePath: string,
  options: MboxReaderOptions = {}
): AsyncGenerator<MboxEntry, void, undefined> {
  const stream = createReadStream(filePath, {
    encoding: 'latin1',
    highWaterMark: (options.bufferSizeKb ?? 64) * 1024,
  });

  let pending: PendingEntry | null = null;
  let index = 0;
  let position = 0;
  let previousLineWasEmpty = true;
  let strayLines = 0;

  try {
    for await (const { text: line, size } of splitLines(stream)) {
      const lineOffset = position;
      position += size;

      if (isMboxDelimiterLine(line, previousLineWasEmpty)) {
        if (pending) {
          yield toEntry(index++, pending);
        }
        pending = { offset: lineOffset, fromLine: line, lines: [] };
      } else if (pending) {
        pending.lines.push(line);
      } else if (line.trim().length > 0) {
        strayLines++;
      }

      previousLineWasEmpty = line.trim().length === 0;
    }

    if (pending) {
      yield toEntry(index, pending);
    }
  } finally {
    stream.destroy();
  }

  if (strayLines > 0) {
    logger.warn('Ignored lines before the first mbox separator', { filePath, strayLines });
  }
}
