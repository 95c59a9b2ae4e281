/**
 * Folder Resolver
 * The one folder decision used by both the converter (output directory) and
 * the uploader (IMAP mailbox), so that the two can never disagree.
 */

import path from 'path';
import type { LabelSettings } from '../config';
import { PriorityResolver } from './PriorityResolver';
import { toSegments } from './LabelSanitizer';

export interface FolderDecision {
  /** Winning label, or null when the fallback folder applies */
  label: string | null;
  /** Filtered, sorted label set the decision was made from */
  labels: string[];
  /** Sanitized folder segments, outermost first */
  segments: string[];
}

export class FolderResolver {
  private readonly ignore: ReadonlySet<string>;
  private readonly resolver: PriorityResolver;
  private readonly fallbackSegments: string[];
  private readonly rootSegments: string[];

  constructor(settings: LabelSettings) {
    this.ignore = settings.ignore;
    this.resolver = new PriorityResolver(settings.priority);
    this.fallbackSegments = toSegments(settings.fallbackFolder);
    this.rootSegments = settings.rootFolder ? toSegments(settings.rootFolder) : [];
  }

  /**
   * Drop ignored and empty labels; the result is deduplicated and sorted.
   */
  filter(labels: Iterable<string>): string[] {
    const kept = new Set<string>();
    for (const label of labels) {
      if (label.length > 0 && !this.ignore.has(label)) {
        kept.add(label);
      }
    }
    return [...kept].sort();
  }

  decide(labels: Iterable<string>): FolderDecision {
    const filtered = this.filter(labels);
    const label = this.resolver.resolve(filtered);

    return {
      label,
      labels: filtered,
      segments: label === null ? [...this.fallbackSegments] : toSegments(label),
    };
  }

  toDirectory(baseDir: string, decision: FolderDecision): string {
    return path.join(baseDir, ...decision.segments);
  }

  /**
   * Server-side mailbox path, placed under the import root when one is set.
   */
  toMailboxPath(decision: FolderDecision, delimiter: string): string {
    return [...this.rootSegments, ...decision.segments].join(delimiter);
  }

  /**
   * Every mailbox that has to exist before `mailboxPath`, outermost first,
   * ending with `mailboxPath` itself.
   */
  mailboxLineage(decision: FolderDecision, delimiter: string): string[] {
    const segments = [...this.rootSegments, ...decision.segments];
    return segments.map((_, index) => segments.slice(0, index + 1).join(delimiter));
  }
}

/** Report key for a decision, independent of the server delimiter */
export function folderKey(decision: FolderDecision): string {
  return decision.segments.join('/');
}
