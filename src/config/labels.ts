/**
 * Label Configuration
 * Built-in ignore set and priority order, and the priority file loader.
 */

import { promises as fs } from 'fs';
import { ConfigurationError } from '../errors';

/**
 * Labels Gmail attaches for state rather than taxonomy. They never take part
 * in folder resolution.
 */
export const DEFAULT_IGNORE_LABELS: readonly string[] = [
  'Opened',
  'Archived',
  'Unread',
  'Important',
  'Category Forums',
  'Category Personal',
  'Category Promotions',
  'Category Purchases',
  'Category Travel',
  'Category Updates',
  'Read Receipt Sent',
  'IMAP_NOTJUNK',
  'IMAP_NonJunk',
  'IMAP_receipt-handled',
];

export const DEFAULT_PRIORITY_ORDER: readonly string[] = ['Sent'];

export const DEFAULT_FALLBACK_FOLDER = 'Other';

export const DEFAULT_IMPORT_ROOT_FOLDER = 'ARCH-IMPORT';

/**
 * Parse priority file contents: one label per line, highest priority first.
 * Blank lines are skipped and a repeated label keeps its first position.
 */
export function parsePriorityOrder(contents: string): string[] {
  const seen = new Set<string>();
  const order: string[] = [];

  for (const line of contents.split(/\r?\n/)) {
    const label = line.trim();
    if (label && !seen.has(label)) {
      seen.add(label);
      order.push(label);
    }
  }

  return order;
}

/**
 * Read a priority file from disk.
 */
export async function loadPriorityOrder(filePath: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw ConfigurationError.priorityFileUnreadable(
      filePath,
      error instanceof Error ? error : new Error(String(error))
    );
  }
  return parsePriorityOrder(contents);
}
