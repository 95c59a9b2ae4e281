/**
 * Message Unit
 * One archived message: stable identity, untouched bytes and its label set.
 */

import { createHash } from 'crypto';

export type MessageOrigin =
  | { kind: 'mbox'; source: string; offset: number; index: number }
  | { kind: 'file'; source: string; relativePath: string };

export interface MessageUnit {
  readonly identity: string;
  readonly rawContent: Buffer;
  readonly labels: ReadonlySet<string>;
  readonly origin: MessageOrigin;
  /** Date header, used as the server-side internal date */
  readonly date?: Date;
}

export const IDENTITY_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Identity of an mbox entry. Stable for as long as the source file is.
 */
export function computeIdentity(offset: number, content: Buffer): string {
  return createHash('sha256').update(`${offset}:`).update(content).digest('hex');
}

/**
 * Identity of an .eml file that was not named by the converter.
 */
export function computeFileIdentity(relativePath: string, content: Buffer): string {
  return createHash('sha256')
    .update(relativePath.split('\\').join('/'))
    .update('\0')
    .update(content)
    .digest('hex');
}

export function createMessageUnit(fields: {
  identity: string;
  rawContent: Buffer;
  labels: Iterable<string>;
  origin: MessageOrigin;
  date?: Date;
}): MessageUnit {
  return Object.freeze({
    identity: fields.identity,
    rawContent: fields.rawContent,
    labels: new Set(fields.labels),
    origin: Object.freeze({ ...fields.origin }),
    date: fields.date,
  });
}
