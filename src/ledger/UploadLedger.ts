/**
 * Upload Ledger
 * Append-only JSONL journal of per-message upload outcomes. Replaying it
 * (last line per identity wins) tells a resumed run what is already on the
 * server.
 */

import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import { createInterface } from 'readline';
import type { FileHandle } from 'fs/promises';
import { z } from 'zod';
import { LedgerError, errorMessage } from '../errors';
import { FileLock, LockOptions, hasErrorCode } from '../utils/FileLock';
import logger from '../utils/logger';

export const UPLOAD_STATUSES = ['pending', 'uploaded', 'failed'] as const;

export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

const uploadRecordSchema = z.object({
  identity: z.string().min(1),
  folder: z.string(),
  status: z.enum(UPLOAD_STATUSES),
  timestamp: z.string(),
  attempts: z.number().int().nonnegative(),
  error: z.string().nullable(),
});

export type UploadRecord = z.infer<typeof uploadRecordSchema>;

export interface LedgerStats {
  total: number;
  pending: number;
  uploaded: number;
  failed: number;
}

export interface LedgerOpenOptions {
  /** Replay the existing journal instead of starting a new one */
  resume?: boolean;
  /** Flush every record to disk before it counts; on by default */
  fsync?: boolean;
  now?: () => Date;
  lock?: LockOptions;
}

export interface RecordOptions {
  error?: string | null;
  /** Attempts made for this outcome, added to the stored total */
  attempts?: number;
}

export interface LedgerReplay {
  records: Map<string, UploadRecord>;
  /** Bytes of the file made of complete lines */
  validBytes: number;
  /** Whether an unterminated last line was discarded */
  tornTail: boolean;
}

/**
 * Read a ledger file. A missing file replays as empty; an unterminated last
 * line is left out; any other unreadable line throws LEDGER_001.
 */
export async function replayLedger(filePath: string): Promise<LedgerReplay> {
  const records = new Map<string, UploadRecord>();

  let size: number;
  try {
    size = (await fs.stat(filePath)).size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return { records, validBytes: 0, tornTail: false };
    }
    throw error;
  }
  if (size === 0) {
    return { records, validBytes: 0, tornTail: false };
  }

  const tornTail = !(await endsWithNewline(filePath, size));

  const rl = createInterface({
    input: createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  let position = 0;
  let held: { line: string; lineNumber: number } | null = null;

  const apply = ({ line, lineNumber: at }: { line: string; lineNumber: number }) => {
    if (line.trim().length === 0) {
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw LedgerError.corrupted(filePath, at, errorMessage(error));
    }
    const parsed = uploadRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw LedgerError.corrupted(
        filePath,
        at,
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid record'
      );
    }
    records.set(parsed.data.identity, parsed.data);
  };

  try {
    for await (const line of rl) {
      lineNumber++;
      if (held) {
        apply(held);
        position += Buffer.byteLength(held.line, 'utf-8') + 1;
      }
      held = { line, lineNumber };
    }
  } finally {
    rl.close();
  }

  if (held) {
    if (tornTail) {
      logger.warn('Discarding unterminated last ledger line', {
        filePath,
        lineNumber: held.lineNumber,
      });
    } else {
      apply(held);
      position += Buffer.byteLength(held.line, 'utf-8') + 1;
    }
  }

  return { records, validBytes: tornTail ? position : size, tornTail };
}

async function endsWithNewline(filePath: string, size: number): Promise<boolean> {
  const handle = await fs.open(filePath, 'r');
  try {
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === 0x0a;
  } finally {
    await handle.close();
  }
}

export function summarize(records: Iterable<UploadRecord>): LedgerStats {
  const stats: LedgerStats = { total: 0, pending: 0, uploaded: 0, failed: 0 };
  for (const record of records) {
    stats.total++;
    stats[record.status]++;
  }
  return stats;
}

export class UploadLedger {
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly handle: FileHandle,
    private readonly lock: FileLock,
    private readonly entries: Map<string, UploadRecord>,
    private readonly fsync: boolean,
    private readonly now: () => Date
  ) {}

  /**
   * Lock the ledger and load it. Without `resume` an existing journal is
   * moved aside to `<path>.<timestamp>.bak` and the run starts empty.
   */
  static async open(filePath: string, options: LedgerOpenOptions = {}): Promise<UploadLedger> {
    const now = options.now ?? (() => new Date());
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });

    const lock = new FileLock(filePath, options.lock);
    const result = await lock.acquire();
    if (!result.acquired) {
      throw LedgerError.locked(filePath, result.owner.pid);
    }

    try {
      let records = new Map<string, UploadRecord>();

      if (options.resume) {
        const replay = await replayLedger(filePath);
        if (replay.tornTail) {
          await fs.truncate(filePath, replay.validBytes);
        }
        records = replay.records;
        logger.info('Upload ledger replayed', {
          filePath,
          ...summarize(records.values()),
          tornTail: replay.tornTail,
        });
      } else {
        await rotate(filePath, now());
      }

      const handle = await fs.open(filePath, 'a');
      return new UploadLedger(filePath, handle, lock, records, options.fsync ?? true, now);
    } catch (error) {
      await lock.release();
      throw error;
    }
  }

  get(identity: string): UploadRecord | undefined {
    return this.entries.get(identity);
  }

  isUploaded(identity: string): boolean {
    return this.entries.get(identity)?.status === 'uploaded';
  }

  /**
   * Append one outcome. The line is on disk before the in-memory state moves.
   */
  async record(
    identity: string,
    folder: string,
    status: UploadStatus,
    options: RecordOptions = {}
  ): Promise<UploadRecord> {
    if (this.closed) {
      throw LedgerError.writeFailed(this.filePath, new Error('ledger is closed'));
    }

    const previous = this.entries.get(identity);
    const record: UploadRecord = {
      identity,
      folder,
      status,
      timestamp: this.now().toISOString(),
      attempts: (previous?.attempts ?? 0) + (options.attempts ?? (status === 'pending' ? 0 : 1)),
      error: options.error ?? null,
    };

    try {
      await this.handle.write(`${JSON.stringify(record)}\n`);
      if (this.fsync) {
        await this.handle.datasync();
      }
    } catch (error) {
      throw LedgerError.writeFailed(
        this.filePath,
        error instanceof Error ? error : new Error(errorMessage(error))
      );
    }

    this.entries.set(identity, record);
    return record;
  }

  stats(): LedgerStats {
    return summarize(this.entries.values());
  }

  records(): UploadRecord[] {
    return [...this.entries.values()];
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.handle.close();
    } finally {
      await this.lock.release();
    }
  }
}

async function rotate(filePath: string, at: Date): Promise<void> {
  let size: number;
  try {
    size = (await fs.stat(filePath)).size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return;
    }
    throw error;
  }

  if (size === 0) {
    return;
  }

  const backupPath = `${filePath}.${at.toISOString().replace(/[:.]/g, '-')}.bak`;
  await fs.rename(filePath, backupPath);
  logger.info('Previous upload ledger moved aside', { filePath, backupPath });
}
