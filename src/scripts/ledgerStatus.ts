#!/usr/bin/env node
import { loadConfig } from '../config';
import { LedgerStats, UploadRecord, replayLedger, summarize } from '../ledger/UploadLedger';
import logger, { setLogLevel } from '../utils/logger';
import { logFailure } from './cliSupport';

export interface CliOptions {
  ledger?: string;
  failed?: boolean;
}

export interface LedgerStatus {
  ledgerPath: string;
  stats: LedgerStats;
  failed: UploadRecord[];
  tornTail: boolean;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--ledger' && args[i + 1]) {
      options.ledger = args[++i];
    } else if (args[i] === '--failed') {
      options.failed = true;
    }
  }
  return options;
}

/**
 * Read-only summary of a ledger; takes no lock and never rewrites the file.
 */
export async function main(options?: CliOptions): Promise<LedgerStatus> {
  const cliOptions = options ?? parseArgs();
  const config = loadConfig({ ledgerPath: cliOptions.ledger });
  setLogLevel(config.logLevel);

  const ledgerPath = config.upload.ledgerPath;
  const replay = await replayLedger(ledgerPath);
  const records = [...replay.records.values()];
  const stats = summarize(records);
  const failed = records.filter((record) => record.status === 'failed');

  logger.info('Upload ledger status', { ledgerPath, ...stats, tornTail: replay.tornTail });

  if (cliOptions.failed) {
    failed.forEach((record) => {
      logger.info('Failed message', {
        identity: record.identity,
        folder: record.folder,
        attempts: record.attempts,
        error: record.error,
        timestamp: record.timestamp,
      });
    });
  }

  return { ledgerPath, stats, failed, tornTail: replay.tornTail };
}

if (require.main === module) {
  main().catch((error) => {
    logFailure('Unable to read upload ledger', error);
    process.exit(1);
  });
}
