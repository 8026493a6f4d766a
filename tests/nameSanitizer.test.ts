/**
 * Tests for NameSanitizer
 * Base names must be safe on common filesystems whatever the provider sends
 */

import fc from 'fast-check';
import { NameSanitizer } from '../src/artifacts';

const FORBIDDEN = /[<>:"/\\|?*\x00-\x1F\x7F-\x9F]/;

describe('NameSanitizer', () => {
  describe('sanitize', () => {
    it('should hyphenate a title', () => {
      expect(NameSanitizer.sanitize('Garden of Forking Paths')).toBe('Garden-of-Forking-Paths');
    });

    it('should remove characters rejected by filesystems', () => {
      expect(NameSanitizer.sanitize('a/b:c*d?e<f>g|h"i\\j')).toBe('abcdefghij');
    });

    it('should collapse whitespace runs and hyphen runs', () => {
      expect(NameSanitizer.sanitize('a \t\n b')).toBe('a-b');
      expect(NameSanitizer.sanitize('a - b')).toBe('a-b');
    });

    it('should strip leading and trailing hyphens', () => {
      expect(NameSanitizer.sanitize('  spaced  out  ')).toBe('spaced-out');
      expect(NameSanitizer.sanitize('--edge--')).toBe('edge');
    });

    it('should remove control characters', () => {
      expect(NameSanitizer.sanitize('bell\x07name\x7F\x85')).toBe('bellname');
    });

    it('should return an empty string for absent or unusable input', () => {
      expect(NameSanitizer.sanitize(undefined)).toBe('');
      expect(NameSanitizer.sanitize(null)).toBe('');
      expect(NameSanitizer.sanitize('')).toBe('');
      expect(NameSanitizer.sanitize('///???')).toBe('');
    });

    it('should keep non-ASCII letters', () => {
      expect(NameSanitizer.sanitize('Jardín de senderos')).toBe('Jardín-de-senderos');
    });

    it('should limit names to 200 code points without splitting surrogate pairs', () => {
      expect(NameSanitizer.sanitize('x'.repeat(300))).toBe('x'.repeat(200));

      const emoji = NameSanitizer.sanitize('😀'.repeat(250));
      expect(Array.from(emoji)).toHaveLength(200);
      expect(emoji).toBe('😀'.repeat(200));
    });

    it('should never throw and never emit a forbidden character', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), (input) => {
          const result = NameSanitizer.sanitize(input);
          expect(FORBIDDEN.test(result)).toBe(false);
          expect(/\s/.test(result)).toBe(false);
          expect(result.includes('--')).toBe(false);
          expect(result.startsWith('-') || result.endsWith('-')).toBe(false);
        }),
        { numRuns: 200 },
      );
    });

    it('should be idempotent', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString({ maxLength: 400 }), (input) => {
          const once = NameSanitizer.sanitize(input);
          expect(NameSanitizer.sanitize(once)).toBe(once);
        }),
        { numRuns: 200 },
      );
    });
  });

  describe('resolveBaseName', () => {
    it('should prefer metadata.name', () => {
      const doc = { title: 'Other', metadata: { name: 'Garden of Forking Paths' } };
      expect(NameSanitizer.resolveBaseName(doc, '1')).toBe('Garden-of-Forking-Paths');
    });

    it('should fall back to title when the name sanitizes to nothing', () => {
      const doc = { title: 'Fallback Title', metadata: { name: '///' } };
      expect(NameSanitizer.resolveBaseName(doc, '1')).toBe('Fallback-Title');
    });

    it('should ignore a name that is not a string', () => {
      const doc = { title: 'Numbered', metadata: { name: 42 } };
      expect(NameSanitizer.resolveBaseName(doc, '1')).toBe('Numbered');
    });

    it('should synthesize token-{id} as a last resort', () => {
      expect(NameSanitizer.resolveBaseName({}, '42')).toBe('token-42');
      expect(NameSanitizer.resolveBaseName({ metadata: null, title: '' }, '7')).toBe('token-7');
    });
  });
});
