import { MAX_SEGMENT_LENGTH, sanitize, toSegments } from '../../labels/LabelSanitizer';

const ALLOWED = /^[A-Za-z0-9_-]+$/;

describe('LabelSanitizer', () => {
  describe('sanitize', () => {
    it('keeps allow-listed characters unchanged', () => {
      expect(sanitize('Work')).toBe('Work');
      expect(sanitize('to-do_2024')).toBe('to-do_2024');
    });

    it('replaces disallowed characters and collapses underscore runs', () => {
      expect(sanitize('Project X, 2023.Q1')).toBe('Project_X_2023_Q1');
    });

    it('strips leading and trailing underscores', () => {
      expect(sanitize('Café')).toBe('Caf');
      expect(sanitize(' [Gmail] ')).toBe('Gmail');
    });

    it('replaces each half of a surrogate pair', () => {
      expect(sanitize('📁 Files')).toBe('Files');
    });

    it('maps empty results to the fixed fallback name', () => {
      expect(sanitize('')).toBe('Unlabeled');
      expect(sanitize('___')).toBe('Unlabeled');
      expect(sanitize('!!!')).toBe('Unlabeled');
    });

    it('caps segment length', () => {
      expect(sanitize('a'.repeat(300))).toHaveLength(MAX_SEGMENT_LENGTH);
    });

    it('is idempotent and only emits allow-listed characters', () => {
      const samples = [
        'Sent',
        'Category Updates',
        'IMAP_receipt-handled',
        'Ünïcödé label',
        '..hidden..',
        '__a__b__',
        `${'x'.repeat(199)} y`,
        '',
        '///',
      ];

      for (const sample of samples) {
        const once = sanitize(sample);
        expect(sanitize(once)).toBe(once);
        expect(once).toMatch(ALLOWED);
      }
    });
  });

  describe('toSegments', () => {
    it('splits nested labels into sanitized segments', () => {
      expect(toSegments('Projects/2023/Taxes')).toEqual(['Projects', '2023', 'Taxes']);
      expect(toSegments('Clients/Acme Corp')).toEqual(['Clients', 'Acme_Corp']);
    });

    it('drops empty parts', () => {
      expect(toSegments('/a//b/')).toEqual(['a', 'b']);
    });

    it('falls back to a single segment when no part is left', () => {
      expect(toSegments('/')).toEqual(['Unlabeled']);
      expect(toSegments('')).toEqual(['Unlabeled']);
    });
  });
});
