/**
 * In-process MailboxSession for driver and script tests.
 */

import type { MailboxSession } from '../../imap/MailboxSession';

export interface AppendedMessage {
  path: string;
  content: string;
  date?: Date;
}

export class FakeMailboxSession implements MailboxSession {
  usable = false;
  connects = 0;
  delimiter = '/';
  readonly mailboxes = new Set<string>();
  readonly appended: AppendedMessage[] = [];
  readonly calls: string[] = [];
  /** Thrown by the next connect calls, in order */
  connectFailures: Error[] = [];
  /** Thrown by the next append calls, in order */
  appendFailures: Error[] = [];
  /** Whether a failed append also drops the connection */
  dropOnAppendFailure = false;
  onAppend?: (message: AppendedMessage) => void;

  async connect(): Promise<void> {
    this.connects++;
    const failure = this.connectFailures.shift();
    if (failure) {
      throw failure;
    }
    this.usable = true;
  }

  async hierarchyDelimiter(): Promise<string> {
    return this.delimiter;
  }

  async createMailbox(path: string): Promise<boolean> {
    this.calls.push(`create ${path}`);
    if (this.mailboxes.has(path)) {
      return false;
    }
    this.mailboxes.add(path);
    return true;
  }

  async openMailbox(path: string): Promise<void> {
    this.calls.push(`select ${path}`);
  }

  async append(path: string, content: Buffer, date?: Date): Promise<void> {
    this.calls.push(`append ${path}`);
    const failure = this.appendFailures.shift();
    if (failure) {
      if (this.dropOnAppendFailure) {
        this.usable = false;
      }
      throw failure;
    }
    const message = { path, content: content.toString('latin1'), date };
    this.appended.push(message);
    this.onAppend?.(message);
  }

  async close(): Promise<void> {
    this.usable = false;
  }
}
