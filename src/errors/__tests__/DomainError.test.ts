/**
 * Domain Error Tests
 */

import {
  DomainError,
  ParsingError,
  ConfigurationError,
  ImapError,
  LedgerError,
  FileSystemError,
  isDomainError,
  wrapError,
  errorMessage,
} from '../DomainError';

describe('DomainError', () => {
  describe('ParsingError', () => {
    it('should create malformed entry error scoped to one message', () => {
      const error = ParsingError.malformedEntry('no header block', { offset: 120 });

      expect(error.message).toBe('Malformed mbox entry: no header block');
      expect(error.code).toBe('PARSE_001');
      expect(error.scope).toBe('message');
      expect(error.isFatal).toBe(false);
      expect(error.context.offset).toBe(120);
    });

    it('should keep the cause of unreadable headers', () => {
      const cause = new Error('bad charset');
      const error = ParsingError.unreadableHeaders(cause, { identity: 'abc' });

      expect(error.code).toBe('PARSE_002');
      expect(error.message).toBe('Unable to parse message headers: bad charset');
      expect(error.context.cause).toBe(cause);
    });
  });

  describe('ConfigurationError', () => {
    it('should list environment issues', () => {
      const error = ConfigurationError.invalidEnvironment([
        { field: 'UPLOAD_PREFETCH', message: 'UPLOAD_PREFETCH: must be a whole number' },
      ]);

      expect(error.code).toBe('CONFIG_001');
      expect(error.message).toBe('Invalid configuration: 1 issue(s)');
      expect(error.issues).toHaveLength(1);
      expect(error.isFatal).toBe(true);
    });

    it('should append usage to argument errors', () => {
      const error = ConfigurationError.usage('Missing mbox file', 'mbox-convert <mbox>');

      expect(error.code).toBe('CONFIG_004');
      expect(error.message).toBe('Missing mbox file\nUsage: mbox-convert <mbox>');
      expect(error.issues).toEqual([{ field: 'argv', message: 'Missing mbox file' }]);
    });

    it('should join connection issues into the message', () => {
      const error = ConfigurationError.invalidConnection([
        { field: 'server', message: '--server is required for custom provider' },
        { field: 'port', message: '--port is required for custom provider' },
      ]);

      expect(error.code).toBe('CONFIG_003');
      expect(error.message).toBe(
        'Invalid IMAP connection options: --server is required for custom provider; --port is required for custom provider'
      );
    });
  });

  describe('ImapError', () => {
    it('should make authentication failures fatal and show guidance', () => {
      const error = ImapError.authenticationFailed('invalid credentials', 'Use an app password.');

      expect(error.code).toBe('IMAP_001');
      expect(error.isFatal).toBe(true);
      expect(error.isRetryable).toBe(false);
      expect(error.toUserMessage()).toBe(
        'Error IMAP_001: IMAP login failed: invalid credentials\nUse an app password.'
      );
    });

    it('should name the host when the server is unreachable', () => {
      const error = ImapError.connectionFailed('imap.test', new Error('ECONNREFUSED'));

      expect(error.code).toBe('IMAP_002');
      expect(error.message).toBe('Unable to connect to IMAP server imap.test: ECONNREFUSED');
      expect(error.isFatal).toBe(true);
    });

    it('should retry transient failures within one message', () => {
      const error = ImapError.transient('timeout');

      expect(error.code).toBe('IMAP_003');
      expect(error.isRetryable).toBe(true);
      expect(error.scope).toBe('message');
    });

    it('should not retry rejected commands', () => {
      const error = ImapError.rejected('Message too large');

      expect(error.code).toBe('IMAP_004');
      expect(error.isRetryable).toBe(false);
      expect(error.isFatal).toBe(false);
    });
  });

  describe('LedgerError', () => {
    it('should carry the file path and line number of a corrupted record', () => {
      const error = LedgerError.corrupted('/tmp/ledger.jsonl', 3, 'Unexpected token');

      expect(error.code).toBe('LEDGER_001');
      expect(error.message).toBe('Upload ledger is corrupted at line 3: Unexpected token');
      expect(error.context).toMatchObject({ filePath: '/tmp/ledger.jsonl', lineNumber: 3 });
    });

    it('should name the process holding the ledger', () => {
      const error = LedgerError.locked('/tmp/ledger.jsonl', 4242);

      expect(error.code).toBe('LEDGER_002');
      expect(error.message).toBe('Upload ledger /tmp/ledger.jsonl is in use by process 4242');
    });
  });

  describe('FileSystemError', () => {
    it('should create not found and not a directory errors', () => {
      expect(FileSystemError.notFound('/tmp/archive.mbox').message).toBe(
        'File not found: /tmp/archive.mbox'
      );
      expect(FileSystemError.notADirectory('/tmp/export').code).toBe('FILE_002');
    });
  });

  describe('serialization', () => {
    it('should replace the cause with its message in JSON', () => {
      const json = LedgerError.writeFailed('/tmp/ledger.jsonl', new Error('disk full')).toJSON();

      expect(json).toMatchObject({
        name: 'LedgerError',
        code: 'LEDGER_003',
        scope: 'session',
        context: { filePath: '/tmp/ledger.jsonl', cause: 'disk full' },
      });
    });
  });

  describe('utilities', () => {
    it('should recognise domain errors', () => {
      expect(isDomainError(ImapError.rejected('x'))).toBe(true);
      expect(isDomainError(new Error('x'))).toBe(false);
    });

    it('should wrap unknown errors', () => {
      const original = new Error('socket hang up');
      const wrapped = wrapError(original);

      expect(wrapped).toBeInstanceOf(DomainError);
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('socket hang up');
      expect(wrapped.context.cause).toBe(original);
    });

    it('should return domain errors unchanged', () => {
      const error = ImapError.transient('timeout');

      expect(wrapError(error)).toBe(error);
    });

    it('should use the default message for non-errors', () => {
      expect(wrapError('boom').message).toBe('An unexpected error occurred');
      expect(errorMessage('boom')).toBe('boom');
    });
  });
});
