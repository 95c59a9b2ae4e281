/**
 * The IMAP subset the uploader needs. Implementations throw ImapError.
 */
export interface MailboxSession {
  /** Whether the connection can take commands */
  readonly usable: boolean;

  /** Open a fresh authenticated connection, dropping any previous one */
  connect(): Promise<void>;

  /** Separator between mailbox hierarchy levels, `/` when the server lists none */
  hierarchyDelimiter(): Promise<string>;

  /** Create a mailbox; false when it already existed */
  createMailbox(path: string): Promise<boolean>;

  openMailbox(path: string): Promise<void>;

  append(path: string, content: Buffer, internalDate?: Date): Promise<void>;

  close(): Promise<void>;
}

export const DEFAULT_HIERARCHY_DELIMITER = '/';
