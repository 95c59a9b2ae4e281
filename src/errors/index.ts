/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  ErrorScope,
  ParsingError,
  ConfigurationError,
  ConfigurationIssue,
  ImapError,
  ImapFailureKind,
  LedgerError,
  FileSystemError,
  isDomainError,
  wrapError,
  errorMessage,
} from './DomainError';
