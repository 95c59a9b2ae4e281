export * from './errors';
export {
  buildConfig,
  loadConfig,
  resolveConnection,
  MigrationConfig,
  LabelSettings,
  UploadSettings,
  RetrySettings,
  ImapTimeouts,
  ImapConnectionSettings,
  ImapProvider,
  ConfigOverrides,
} from './config';
export {
  DEFAULT_IGNORE_LABELS,
  DEFAULT_PRIORITY_ORDER,
  DEFAULT_FALLBACK_FOLDER,
  DEFAULT_IMPORT_ROOT_FOLDER,
  loadPriorityOrder,
  parsePriorityOrder,
} from './config/labels';
export { sanitize, toSegments, UNLABELED_SEGMENT } from './labels/LabelSanitizer';
export { PriorityResolver } from './labels/PriorityResolver';
export { FolderResolver, FolderDecision, folderKey } from './labels/FolderResolver';
export { readMessageHeaders, splitLabelHeader, MessageHeaders } from './labels/LabelExtractor';
export { readMboxEntries, isMboxDelimiterLine, MboxEntry } from './ingestion/MboxReader';
export {
  MessageUnit,
  MessageOrigin,
  computeIdentity,
  computeFileIdentity,
  createMessageUnit,
} from './ingestion/MessageUnit';
export { MboxConverter, ConversionReport, SkippedEntry } from './ingestion/MboxConverter';
export {
  UploadLedger,
  UploadRecord,
  UploadStatus,
  LedgerStats,
  replayLedger,
  summarize,
} from './ledger/UploadLedger';
export { MailboxSession } from './imap/MailboxSession';
export { ImapFlowSession, toCrlf } from './imap/ImapFlowSession';
export { classifyImapError } from './imap/imapErrors';
export { EmlDirectorySource, EmlFile, MessageSource, PendingMessage } from './upload/EmlDirectorySource';
export { UploadDriver, UploadDriverOptions, UploadReport } from './upload/UploadDriver';
