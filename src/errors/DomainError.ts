/**
 * Domain Error Base Class
 * Provides structured error handling with error codes, failure scope
 * (message vs. whole run) and retry capability information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Parsing Errors
  | 'PARSE_001' // Malformed mbox entry
  | 'PARSE_002' // Unreadable message headers
  // Configuration Errors
  | 'CONFIG_001' // Invalid environment
  | 'CONFIG_002' // Priority file unreadable
  | 'CONFIG_003' // Invalid connection options
  | 'CONFIG_004' // Missing or invalid command-line arguments
  // IMAP Errors
  | 'IMAP_001' // Authentication failed
  | 'IMAP_002' // Connection failed
  | 'IMAP_003' // Transient failure (timeout, reset, throttling)
  | 'IMAP_004' // Command rejected by server
  // Ledger Errors
  | 'LEDGER_001' // Corrupted record
  | 'LEDGER_002' // Ledger locked by another process
  | 'LEDGER_003' // Ledger write failed
  // File System Errors
  | 'FILE_001' // File not found
  | 'FILE_002' // Not a directory
  // Generic Errors
  | 'UNKNOWN';

/**
 * `message` failures affect a single archived message and never abort a run;
 * `session` failures affect every remaining message and always do.
 */
export type ErrorScope = 'message' | 'session';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Message identity if applicable */
  identity?: string;
  /** File path if applicable */
  filePath?: string;
  /** Line number if applicable */
  lineNumber?: number;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the failure ends the whole run */
  abstract readonly scope: ErrorScope;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  get isFatal(): boolean {
    return this.scope === 'session';
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...context } = this.context;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      scope: this.scope,
      isRetryable: this.isRetryable,
      context: cause ? { ...context, cause: cause.message } : context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Create an operator-facing message.
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParsingError extends DomainError {
  readonly code: ErrorCode;
  readonly scope = 'message' as const;

  constructor(
    message: string,
    code: 'PARSE_001' | 'PARSE_002',
    context: DomainErrorContext = {}
  ) {
    super(message, context, false);
    this.code = code;
  }

  static malformedEntry(details: string, context: DomainErrorContext = {}): ParsingError {
    return new ParsingError(`Malformed mbox entry: ${details}`, 'PARSE_001', context);
  }

  static unreadableHeaders(cause: Error, context: DomainErrorContext = {}): ParsingError {
    return new ParsingError(
      `Unable to parse message headers: ${cause.message}`,
      'PARSE_002',
      { ...context, cause }
    );
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export interface ConfigurationIssue {
  field: string;
  message: string;
}

export class ConfigurationError extends DomainError {
  readonly code: ErrorCode;
  readonly scope = 'session' as const;

  constructor(
    message: string,
    code: 'CONFIG_001' | 'CONFIG_002' | 'CONFIG_003' | 'CONFIG_004',
    public readonly issues: ConfigurationIssue[] = [],
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, issues }, false);
    this.code = code;
  }

  static invalidEnvironment(issues: ConfigurationIssue[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid configuration: ${issues.length} issue(s)`,
      'CONFIG_001',
      issues
    );
  }

  static priorityFileUnreadable(filePath: string, cause: Error): ConfigurationError {
    return new ConfigurationError(
      `Error reading label priority file: ${filePath}`,
      'CONFIG_002',
      [],
      { filePath, cause }
    );
  }

  static usage(message: string, usage: string): ConfigurationError {
    return new ConfigurationError(`${message}\nUsage: ${usage}`, 'CONFIG_004', [
      { field: 'argv', message },
    ]);
  }

  static invalidConnection(issues: ConfigurationIssue[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid IMAP connection options: ${issues.map((issue) => issue.message).join('; ')}`,
      'CONFIG_003',
      issues
    );
  }
}

// ============================================================================
// IMAP Errors
// ============================================================================

export type ImapFailureKind = 'authentication' | 'connection' | 'transient' | 'rejected';

const IMAP_CODES: Record<ImapFailureKind, ErrorCode> = {
  authentication: 'IMAP_001',
  connection: 'IMAP_002',
  transient: 'IMAP_003',
  rejected: 'IMAP_004',
};

export class ImapError extends DomainError {
  readonly code: ErrorCode;
  readonly scope: ErrorScope;

  constructor(
    message: string,
    public readonly kind: ImapFailureKind,
    context: DomainErrorContext = {},
    public readonly guidance?: string
  ) {
    super(message, context, kind === 'transient');
    this.code = IMAP_CODES[kind];
    this.scope = kind === 'authentication' || kind === 'connection' ? 'session' : 'message';
  }

  static authenticationFailed(details: string, guidance: string, cause?: Error): ImapError {
    return new ImapError(`IMAP login failed: ${details}`, 'authentication', { cause }, guidance);
  }

  static connectionFailed(host: string, cause?: Error): ImapError {
    return new ImapError(
      `Unable to connect to IMAP server ${host}${cause ? `: ${cause.message}` : ''}`,
      'connection',
      { host, cause }
    );
  }

  static transient(details: string, context: DomainErrorContext = {}): ImapError {
    return new ImapError(details, 'transient', context);
  }

  static rejected(details: string, context: DomainErrorContext = {}): ImapError {
    return new ImapError(details, 'rejected', context);
  }

  toUserMessage(): string {
    const base = super.toUserMessage();
    return this.guidance ? `${base}\n${this.guidance}` : base;
  }
}

// ============================================================================
// Ledger Errors
// ============================================================================

export class LedgerError extends DomainError {
  readonly code: ErrorCode;
  readonly scope = 'session' as const;

  constructor(
    message: string,
    code: 'LEDGER_001' | 'LEDGER_002' | 'LEDGER_003',
    filePath: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, filePath }, false);
    this.code = code;
  }

  static corrupted(filePath: string, lineNumber: number, details: string): LedgerError {
    return new LedgerError(
      `Upload ledger is corrupted at line ${lineNumber}: ${details}`,
      'LEDGER_001',
      filePath,
      { lineNumber }
    );
  }

  static locked(filePath: string, ownerPid: number): LedgerError {
    return new LedgerError(
      `Upload ledger ${filePath} is in use by process ${ownerPid}`,
      'LEDGER_002',
      filePath,
      { ownerPid }
    );
  }

  static writeFailed(filePath: string, cause: Error): LedgerError {
    return new LedgerError(
      `Failed to append to upload ledger: ${cause.message}`,
      'LEDGER_003',
      filePath,
      { cause }
    );
  }
}

// ============================================================================
// File System Errors
// ============================================================================

export class FileSystemError extends DomainError {
  readonly code: ErrorCode;
  readonly scope = 'session' as const;

  constructor(
    message: string,
    code: 'FILE_001' | 'FILE_002',
    filePath: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, filePath }, false);
    this.code = code;
  }

  static notFound(filePath: string): FileSystemError {
    return new FileSystemError(`File not found: ${filePath}`, 'FILE_001', filePath);
  }

  static notADirectory(filePath: string): FileSystemError {
    return new FileSystemError(
      `The directory '${filePath}' does not exist.`,
      'FILE_002',
      filePath
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
  readonly scope = 'session' as const;
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new UnknownError(message, { cause });
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
