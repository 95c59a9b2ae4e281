/**
 * ImapFlow Session
 * MailboxSession over imapflow. A new client is created for every connect
 * since an imapflow client cannot reconnect once closed.
 */

import { ImapFlow, ImapFlowOptions } from 'imapflow';
import type { ImapConnectionSettings, ImapTimeouts } from '../config';
import { ImapError } from '../errors';
import logger from '../utils/logger';
import { classifyImapError, isAlreadyExists } from './imapErrors';
import { DEFAULT_HIERARCHY_DELIMITER, MailboxSession } from './MailboxSession';

export type ImapClientFactory = (options: ImapFlowOptions) => ImapFlow;

export interface ImapFlowSessionOptions {
  connection: ImapConnectionSettings;
  timeouts: ImapTimeouts;
  createClient?: ImapClientFactory;
}

/**
 * IMAP APPEND takes CRLF line endings; bare LF is rewritten, existing CRLF kept.
 */
export function toCrlf(content: Buffer): Buffer {
  return Buffer.from(content.toString('latin1').replace(/\r?\n/g, '\r\n'), 'latin1');
}

export class ImapFlowSession implements MailboxSession {
  private client: ImapFlow | null = null;
  private readonly createClient: ImapClientFactory;

  constructor(private readonly options: ImapFlowSessionOptions) {
    this.createClient = options.createClient ?? ((clientOptions) => new ImapFlow(clientOptions));
  }

  get usable(): boolean {
    return this.client?.usable ?? false;
  }

  async connect(): Promise<void> {
    await this.close();

    const { connection, timeouts } = this.options;
    const client = this.createClient({
      host: connection.host,
      port: connection.port,
      secure: connection.secure,
      auth: { user: connection.user, pass: connection.password },
      tls: connection.allowSelfSigned ? { rejectUnauthorized: false } : undefined,
      logger: false,
      connectionTimeout: timeouts.connectionTimeoutMs,
      greetingTimeout: timeouts.greetingTimeoutMs,
      socketTimeout: timeouts.socketTimeoutMs,
    });

    client.on('error', (error: Error) => {
      logger.warn('IMAP connection error', { host: connection.host, error: error.message });
    });

    try {
      await client.connect();
    } catch (error) {
      client.close();
      throw classifyImapError(error, {
        provider: connection.provider,
        host: connection.host,
        phase: 'connect',
      });
    }

    this.client = client;
    logger.info('Connected to IMAP server', {
      host: connection.host,
      port: connection.port,
      user: connection.user,
    });
  }

  async hierarchyDelimiter(): Promise<string> {
    const client = this.requireClient();
    try {
      const mailboxes = await client.list();
      return mailboxes.find((mailbox) => mailbox.delimiter)?.delimiter ?? DEFAULT_HIERARCHY_DELIMITER;
    } catch (error) {
      throw this.classify(error);
    }
  }

  async createMailbox(path: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      const result = await client.mailboxCreate(path);
      return result.created;
    } catch (error) {
      if (isAlreadyExists(error)) {
        return false;
      }
      throw this.classify(error, path);
    }
  }

  async openMailbox(path: string): Promise<void> {
    const client = this.requireClient();
    try {
      await client.mailboxOpen(path);
    } catch (error) {
      throw this.classify(error, path);
    }
  }

  async append(path: string, content: Buffer, internalDate?: Date): Promise<void> {
    const client = this.requireClient();
    let result: unknown;
    try {
      result = await client.append(path, toCrlf(content), [], internalDate);
    } catch (error) {
      throw this.classify(error, path);
    }
    if (!result) {
      throw ImapError.rejected('Server did not acknowledge APPEND', { mailbox: path });
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }

    if (client.usable) {
      try {
        await client.logout();
        return;
      } catch (error) {
        logger.debug('IMAP logout failed, closing socket', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    client.close();
  }

  private requireClient(): ImapFlow {
    if (!this.client || !this.client.usable) {
      throw ImapError.transient('IMAP connection is not available', {
        host: this.options.connection.host,
      });
    }
    return this.client;
  }

  private classify(error: unknown, mailbox?: string): ImapError {
    return classifyImapError(error, {
      provider: this.options.connection.provider,
      host: this.options.connection.host,
      phase: 'command',
      mailbox,
    });
  }
}
