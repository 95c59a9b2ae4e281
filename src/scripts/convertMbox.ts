#!/usr/bin/env node
import path from 'path';
import { loadConfig, ConfigOverrides } from '../config';
import { loadPriorityOrder } from '../config/labels';
import { ConfigurationError } from '../errors';
import { ConversionReport, MboxConverter } from '../ingestion/MboxConverter';
import { FolderResolver } from '../labels/FolderResolver';
import logger, { setLogLevel } from '../utils/logger';
import { logFailure } from './cliSupport';

const USAGE = 'convertMbox <mbox-file> [priority-file] [--output dir] [--show-labels]';

export interface CliOptions {
  mboxPath?: string;
  priorityFile?: string;
  output?: string;
  showLabels?: boolean;
}

export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  const options: CliOptions = {};
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--output' && args[i + 1]) {
      options.output = args[++i];
    } else if (args[i] === '--priority-file' && args[i + 1]) {
      options.priorityFile = args[++i];
    } else if (args[i] === '--show-labels' || args[i] === '--list-labels') {
      options.showLabels = true;
    } else if (!args[i].startsWith('--')) {
      positional.push(args[i]);
    }
  }
  options.mboxPath = positional[0];
  options.priorityFile = options.priorityFile ?? positional[1];
  return options;
}

/**
 * `<dir>/<name>.mbox` converts into `<dir>/<name>-eml` unless told otherwise.
 */
export function defaultOutputDir(mboxPath: string): string {
  const parsed = path.parse(mboxPath);
  return path.join(parsed.dir, `${parsed.name}-eml`);
}

export async function main(options?: CliOptions): Promise<ConversionReport> {
  const cliOptions = options ?? parseArgs();
  if (!cliOptions.mboxPath) {
    throw ConfigurationError.usage('No mbox file provided', USAGE);
  }

  const overrides: ConfigOverrides = {};
  if (cliOptions.priorityFile) {
    overrides.priorityOrder = await loadPriorityOrder(cliOptions.priorityFile);
  }
  const config = loadConfig(overrides);
  setLogLevel(config.logLevel);

  const converter = new MboxConverter(new FolderResolver(config.labels));

  if (cliOptions.showLabels) {
    const report = await converter.showLabels(cliOptions.mboxPath);
    Object.entries(report.folders)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .forEach(([folder, count]) => {
        console.log(`${folder}\t${count}`);
      });
    logger.info('Distinct labels', { labels: report.labels });
    return report;
  }

  const outputDir = cliOptions.output ?? defaultOutputDir(cliOptions.mboxPath);
  const report = await converter.convert(cliOptions.mboxPath, outputDir);

  if (report.skipped.length > 0) {
    logger.warn('Some mbox entries were skipped', {
      skipped: report.skipped.length,
      firstOffsets: report.skipped.slice(0, 10).map((entry) => entry.offset),
    });
  }

  return report;
}

if (require.main === module) {
  main().catch((error) => {
    logFailure('Mbox conversion failed', error);
    process.exit(1);
  });
}
