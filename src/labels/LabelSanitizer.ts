/**
 * Label Sanitizer
 * Turns archive labels into folder-path segments that are safe both as
 * directory names and as IMAP mailbox names.
 */

/** Segment used when nothing usable is left of a label */
export const UNLABELED_SEGMENT = 'Unlabeled';

export const MAX_SEGMENT_LENGTH = 200;

const DISALLOWED = /[^A-Za-z0-9_-]/g;
const UNDERSCORE_RUN = /_{2,}/g;
const EDGE_UNDERSCORES = /^_+|_+$/g;

/**
 * Sanitize one label (or one part of a nested label).
 * Deterministic and idempotent; the result only holds `[A-Za-z0-9_-]`.
 */
export function sanitize(label: string): string {
  const segment = label
    .replace(DISALLOWED, '_')
    .replace(UNDERSCORE_RUN, '_')
    .slice(0, MAX_SEGMENT_LENGTH)
    .replace(EDGE_UNDERSCORES, '');

  return segment.length > 0 ? segment : UNLABELED_SEGMENT;
}

/**
 * Split a nested label (`Projects/2023/Taxes`) into sanitized segments.
 */
export function toSegments(label: string): string[] {
  const parts = label.split('/').filter((part) => part.length > 0);
  if (parts.length === 0) {
    return [sanitize(label)];
  }
  return parts.map(sanitize);
}
