#!/usr/bin/env node
import {
  ConfigOverrides,
  ImapConnectionSettings,
  ImapTimeouts,
  loadConfig,
  resolveConnection,
} from '../config';
import { loadPriorityOrder } from '../config/labels';
import { ConfigurationError } from '../errors';
import { ImapFlowSession } from '../imap/ImapFlowSession';
import type { MailboxSession } from '../imap/MailboxSession';
import { FolderResolver } from '../labels/FolderResolver';
import { UploadLedger } from '../ledger/UploadLedger';
import { EmlDirectorySource } from '../upload/EmlDirectorySource';
import { UploadDriver, UploadReport } from '../upload/UploadDriver';
import logger, { setLogLevel } from '../utils/logger';
import { RateLimiter } from '../utils/retry';
import { logFailure } from './cliSupport';

const USAGE =
  'uploadEml --imap-provider gmail|custom --directory <dir> [--email addr] ' +
  '[--server host --port n --username user] [--password pw] [--resume] [--ledger path] ' +
  '[--priority-file path] [--insecure] [--allow-self-signed]';

export interface CliOptions {
  provider?: string;
  directory?: string;
  email?: string;
  server?: string;
  port?: string;
  username?: string;
  password?: string;
  insecure?: boolean;
  allowSelfSigned?: boolean;
  resume?: boolean;
  ledger?: string;
  priorityFile?: string;
}

export interface UploadDependencies {
  createSession?: (connection: ImapConnectionSettings, timeouts: ImapTimeouts) => MailboxSession;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

type ValueOption = Exclude<keyof CliOptions, 'insecure' | 'allowSelfSigned' | 'resume'>;

const VALUE_FLAGS: Record<string, ValueOption | undefined> = {
  '--imap-provider': 'provider',
  '--directory': 'directory',
  '--email': 'email',
  '--server': 'server',
  '--port': 'port',
  '--username': 'username',
  '--password': 'password',
  '--ledger': 'ledger',
  '--priority-file': 'priorityFile',
};

export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  const options: CliOptions = {};
  for (let i = 0; i < args.length; i++) {
    const key = VALUE_FLAGS[args[i]];
    if (key && args[i + 1]) {
      options[key] = args[++i];
    } else if (args[i] === '--resume') {
      options.resume = true;
    } else if (args[i] === '--insecure') {
      options.insecure = true;
    } else if (args[i] === '--allow-self-signed') {
      options.allowSelfSigned = true;
    }
  }
  return options;
}

function defaultSession(connection: ImapConnectionSettings, timeouts: ImapTimeouts): MailboxSession {
  return new ImapFlowSession({ connection, timeouts });
}

export async function main(
  options?: CliOptions,
  dependencies: UploadDependencies = {}
): Promise<UploadReport> {
  const cliOptions = options ?? parseArgs();
  if (!cliOptions.directory) {
    throw ConfigurationError.usage('No directory provided', USAGE);
  }

  const overrides: ConfigOverrides = { ledgerPath: cliOptions.ledger };
  if (cliOptions.priorityFile) {
    overrides.priorityOrder = await loadPriorityOrder(cliOptions.priorityFile);
  }
  const config = loadConfig(overrides);
  setLogLevel(config.logLevel);

  const connection = resolveConnection({
    provider: cliOptions.provider,
    email: cliOptions.email,
    server: cliOptions.server,
    port: cliOptions.port,
    username: cliOptions.username,
    password: cliOptions.password ?? process.env.IMAP_PASSWORD,
    insecure: cliOptions.insecure ?? false,
    allowSelfSigned: cliOptions.allowSelfSigned ?? false,
  });

  const resolver = new FolderResolver(config.labels);
  const source = new EmlDirectorySource(cliOptions.directory, resolver);
  await source.assertReadable();

  const ledger = await UploadLedger.open(config.upload.ledgerPath, {
    resume: cliOptions.resume ?? false,
  });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn('Stopping after the current message', { signal });
    controller.abort();
  };
  if (!dependencies.signal) {
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  }

  try {
    const createSession = dependencies.createSession ?? defaultSession;
    const driver = new UploadDriver({
      resolver,
      ledger,
      session: createSession(connection, config.imap),
      retry: config.upload.retry,
      prefetch: config.upload.prefetch,
      rateLimiter: config.upload.ratePerSecond
        ? new RateLimiter({ requestsPerSecond: config.upload.ratePerSecond })
        : null,
      signal: dependencies.signal ?? controller.signal,
      serverName: connection.host,
      sleep: dependencies.sleep,
    });

    logger.info('Starting upload', {
      directory: source.rootDir,
      host: connection.host,
      ledger: config.upload.ledgerPath,
      resume: cliOptions.resume ?? false,
    });

    const report = await driver.run(source);

    if (report.failed > 0) {
      logger.warn('Some messages failed; run again with --resume to retry them', {
        failed: report.failed,
        ledger: config.upload.ledgerPath,
      });
    }
    return report;
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
    await ledger.close();
  }
}

if (require.main === module) {
  main()
    .then((report) => {
      if (report.interrupted) {
        process.exitCode = 130;
      }
    })
    .catch((error) => {
      logFailure('Upload failed', error);
      process.exit(1);
    });
}
