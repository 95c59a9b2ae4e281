/**
 * Upload Driver
 * Delivers message units to one IMAP session, one at a time, recording every
 * outcome in the ledger before moving on. Disk reads run ahead of the append
 * in flight; server commands and ledger writes never overlap.
 */

import type { RetrySettings } from '../config';
import { ImapError, errorMessage, isDomainError } from '../errors';
import type { MailboxSession } from '../imap/MailboxSession';
import type { MessageUnit } from '../ingestion/MessageUnit';
import { FolderDecision, FolderResolver } from '../labels/FolderResolver';
import type { UploadLedger } from '../ledger/UploadLedger';
import logger from '../utils/logger';
import { readAhead } from '../utils/readAhead';
import { RateLimiter, withRetry } from '../utils/retry';
import type { MessageSource, PendingMessage } from './EmlDirectorySource';

export interface UploadDriverOptions {
  resolver: FolderResolver;
  ledger: UploadLedger;
  session: MailboxSession;
  retry: RetrySettings;
  /** Messages read from disk ahead of the current append */
  prefetch?: number;
  rateLimiter?: RateLimiter | null;
  /** Stops the run between messages */
  signal?: AbortSignal;
  /** Server name used in connection errors */
  serverName?: string;
  progressInterval?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface UploadReport {
  total: number;
  skipped: number;
  uploaded: number;
  failed: number;
  foldersCreated: number;
  interrupted: boolean;
}

const isRetryableImapError = (error: unknown) => error instanceof ImapError && error.isRetryable;

export class UploadDriver {
  private delimiter = '/';
  /** Mailboxes created (or found) and selected in the current session */
  private readonly ensured = new Set<string>();
  /** Ancestor mailboxes known to exist in the current session */
  private readonly existing = new Set<string>();
  private readonly prefetch: number;
  private readonly progressInterval: number;

  constructor(private readonly options: UploadDriverOptions) {
    this.prefetch = Math.max(1, options.prefetch ?? 4);
    this.progressInterval = Math.max(1, options.progressInterval ?? 100);
  }

  async run<T extends PendingMessage>(source: MessageSource<T>): Promise<UploadReport> {
    const { ledger, signal } = this.options;
    const report: UploadReport = {
      total: 0,
      skipped: 0,
      uploaded: 0,
      failed: 0,
      foldersCreated: 0,
      interrupted: false,
    };
    const expected = source.count ? await source.count() : null;

    // Entries whose file name already carries an uploaded identity are never read
    const candidates = async function* (): AsyncGenerator<T, void, undefined> {
      for await (const entry of source.entries()) {
        report.total++;
        if (entry.identity !== null && ledger.isUploaded(entry.identity)) {
          report.skipped++;
          continue;
        }
        yield entry;
      }
    };

    await this.connect();

    try {
      let processed = 0;
      for await (const settled of readAhead(candidates(), (entry) => source.load(entry), this.prefetch)) {
        if (signal?.aborted) {
          report.interrupted = true;
          break;
        }

        if (!settled.ok) {
          await this.recordUnreadable(settled.item, settled.error, report);
        } else if (ledger.isUploaded(settled.value.identity)) {
          report.skipped++;
        } else {
          await this.upload(settled.value, report);
        }

        processed++;
        if (processed % this.progressInterval === 0) {
          const done = report.uploaded + report.failed + report.skipped;
          logger.info('Upload progress', {
            progress: `${done}/${expected ?? '?'}`,
            uploaded: report.uploaded,
            failed: report.failed,
            skipped: report.skipped,
          });
        }
      }
    } finally {
      await this.options.session.close();
    }

    logger.info('Upload run finished', { ...report });
    return report;
  }

  /**
   * Pending → Uploading → Uploaded | Failed for one message.
   */
  private async upload(unit: MessageUnit, report: UploadReport): Promise<void> {
    const { resolver, ledger, session, rateLimiter } = this.options;
    await this.reconnectIfNeeded();
    const decision = resolver.decide(unit.labels);
    const mailbox = resolver.toMailboxPath(decision, this.delimiter);
    let attempts = 0;

    try {
      await withRetry(
        async () => {
          attempts++;
          await rateLimiter?.acquire();
          await this.ensureMailbox(decision, mailbox, report);
          await session.append(mailbox, unit.rawContent, unit.date);
        },
        {
          ...this.options.retry,
          operation: 'IMAP append',
          shouldRetry: isRetryableImapError,
          beforeRetry: () => this.reconnectIfNeeded(),
          sleep: this.options.sleep,
        }
      );
    } catch (error) {
      if (!(error instanceof ImapError) || error.isFatal) {
        throw error;
      }

      await ledger.record(unit.identity, mailbox, 'failed', { error: error.message, attempts });
      report.failed++;
      logger.warn('Message upload failed', {
        identity: unit.identity,
        mailbox,
        attempts,
        code: error.code,
        error: error.message,
      });
      return;
    }

    await ledger.record(unit.identity, mailbox, 'uploaded', { attempts });
    report.uploaded++;
    logger.debug('Message uploaded', { identity: unit.identity, mailbox, attempts });
  }

  private async recordUnreadable(entry: PendingMessage, error: unknown, report: UploadReport) {
    if (isDomainError(error) && error.isFatal) {
      throw error;
    }
    const identity = entry.identity ?? entry.location;
    await this.options.ledger.record(identity, '', 'failed', { error: errorMessage(error) });
    report.failed++;
    logger.warn('Message could not be read', {
      location: entry.location,
      error: errorMessage(error),
    });
  }

  /**
   * Create every ancestor, then the mailbox itself, then select it. Skipped
   * for mailboxes already handled in this session.
   */
  private async ensureMailbox(
    decision: FolderDecision,
    mailbox: string,
    report: UploadReport
  ): Promise<void> {
    if (this.ensured.has(mailbox)) {
      return;
    }

    const { resolver, session } = this.options;
    for (const lineage of resolver.mailboxLineage(decision, this.delimiter)) {
      if (this.existing.has(lineage)) continue;
      if (await session.createMailbox(lineage)) {
        report.foldersCreated++;
        logger.info('Created mailbox', { mailbox: lineage });
      }
      this.existing.add(lineage);
    }

    await session.openMailbox(mailbox);
    this.ensured.add(mailbox);
  }

  private async connect(): Promise<void> {
    const { session } = this.options;
    try {
      this.delimiter = await withRetry(
        async () => {
          await session.connect();
          return session.hierarchyDelimiter();
        },
        {
          ...this.options.retry,
          operation: 'IMAP connect',
          shouldRetry: isRetryableImapError,
          sleep: this.options.sleep,
        }
      );
    } catch (error) {
      if (error instanceof ImapError && error.kind === 'authentication') {
        throw error;
      }
      throw ImapError.connectionFailed(
        this.options.serverName ?? 'IMAP server',
        error instanceof Error ? error : undefined
      );
    } finally {
      this.ensured.clear();
      this.existing.clear();
    }
  }

  private async reconnectIfNeeded(): Promise<void> {
    if (this.options.session.usable) {
      return;
    }
    logger.warn('IMAP session lost, reconnecting');
    await this.connect();
  }
}
