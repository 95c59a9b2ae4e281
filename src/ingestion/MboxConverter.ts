/**
 * Mbox Converter
 * Splits an mbox archive into one `<identity>.eml` file per message, placed
 * in the directory of the message's resolved folder.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FileSystemError, ParsingError } from '../errors';
import { FolderDecision, FolderResolver, folderKey } from '../labels/FolderResolver';
import { MessageHeaders, readMessageHeaders } from '../labels/LabelExtractor';
import logger from '../utils/logger';
import { readMboxEntries } from './MboxReader';
import { MessageUnit, computeIdentity, createMessageUnit } from './MessageUnit';

export const LABELS_FILE_NAME = 'labels.txt';
export const EML_EXTENSION = '.eml';

export interface SkippedEntry {
  index: number;
  offset: number;
  code: string;
  reason: string;
}

export interface ConversionReport {
  mboxPath: string;
  /** Null for a show-labels pass */
  outputDir: string | null;
  entries: number;
  converted: number;
  /** Files already present from an earlier run */
  unchanged: number;
  skipped: SkippedEntry[];
  /** Message count per resolved folder (`/`-joined segments) */
  folders: Record<string, number>;
  /** Distinct labels after ignore filtering, sorted */
  labels: string[];
}

export interface ConverterOptions {
  progressInterval?: number;
}

interface ResolvedUnit {
  unit: MessageUnit;
  decision: FolderDecision;
}

export class MboxConverter {
  private readonly progressInterval: number;

  constructor(
    private readonly resolver: FolderResolver,
    options: ConverterOptions = {}
  ) {
    this.progressInterval = options.progressInterval ?? 1000;
  }

  /**
   * Write every message to `outputDir`. Existing files are left untouched, so
   * running twice over the same archive only writes what is missing.
   */
  async convert(mboxPath: string, outputDir: string): Promise<ConversionReport> {
    const report = this.emptyReport(mboxPath, outputDir);
    const createdDirs = new Set<string>();

    await fs.mkdir(outputDir, { recursive: true });

    for await (const { unit, decision } of this.resolveUnits(mboxPath, report)) {
      const directory = this.resolver.toDirectory(outputDir, decision);
      const target = path.join(directory, `${unit.identity}${EML_EXTENSION}`);

      if (!createdDirs.has(directory)) {
        await fs.mkdir(directory, { recursive: true });
        createdDirs.add(directory);
      }

      if (await fileExists(target)) {
        report.unchanged++;
        continue;
      }

      const partial = `${target}.partial`;
      await fs.writeFile(partial, unit.rawContent);
      await fs.rename(partial, target);
      report.converted++;
    }

    const labelsPath = path.join(outputDir, LABELS_FILE_NAME);
    await fs.writeFile(
      labelsPath,
      report.labels.map((label) => `${label}\n`).join(''),
      'utf-8'
    );

    logger.info('Mbox conversion complete', {
      mboxPath,
      outputDir,
      entries: report.entries,
      converted: report.converted,
      unchanged: report.unchanged,
      skipped: report.skipped.length,
      folders: Object.keys(report.folders).length,
    });

    return report;
  }

  /**
   * Dry run: resolve every message's folder and count them, writing nothing.
   */
  async showLabels(mboxPath: string): Promise<ConversionReport> {
    const report = this.emptyReport(mboxPath, null);

    for await (const resolved of this.resolveUnits(mboxPath, report)) {
      logger.debug('Resolved folder', {
        identity: resolved.unit.identity,
        folder: folderKey(resolved.decision),
      });
    }

    logger.info('Label scan complete', {
      mboxPath,
      entries: report.entries,
      skipped: report.skipped.length,
      folders: Object.keys(report.folders).length,
      labels: report.labels.length,
    });

    return report;
  }

  private emptyReport(mboxPath: string, outputDir: string | null): ConversionReport {
    return {
      mboxPath,
      outputDir,
      entries: 0,
      converted: 0,
      unchanged: 0,
      skipped: [],
      folders: {},
      labels: [],
    };
  }

  private async *resolveUnits(
    mboxPath: string,
    report: ConversionReport
  ): AsyncGenerator<ResolvedUnit, void, undefined> {
    await assertFile(mboxPath);
    const labels = new Set<string>();

    for await (const entry of readMboxEntries(mboxPath)) {
      report.entries++;
      if (report.entries % this.progressInterval === 0) {
        logger.info('Conversion progress', { entries: report.entries });
      }

      const identity = computeIdentity(entry.offset, entry.content);
      let headers: MessageHeaders;
      try {
        headers = await readMessageHeaders(entry.content, { identity, offset: entry.offset });
      } catch (error) {
        if (!(error instanceof ParsingError)) {
          throw error;
        }
        logger.warn('Skipping malformed mbox entry', {
          index: entry.index,
          offset: entry.offset,
          code: error.code,
          error: error.message,
        });
        report.skipped.push({
          index: entry.index,
          offset: entry.offset,
          code: error.code,
          reason: error.message,
        });
        continue;
      }

      const decision = this.resolver.decide(headers.labels);
      decision.labels.forEach((label) => labels.add(label));
      const key = folderKey(decision);
      report.folders[key] = (report.folders[key] ?? 0) + 1;

      const unit = createMessageUnit({
        identity,
        rawContent: entry.content,
        labels: decision.labels,
        origin: { kind: 'mbox', source: mboxPath, offset: entry.offset, index: entry.index },
        date: headers.date,
      });

      yield { unit, decision };
    }

    report.labels = [...labels].sort();
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function assertFile(filePath: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw FileSystemError.notFound(filePath);
    }
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw FileSystemError.notFound(filePath);
  }
}
