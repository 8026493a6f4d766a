/**
 * Tests for ExtensionResolver
 * URL first, MIME hint second, `bin` last
 */

import fc from 'fast-check';
import { DEFAULT_EXTENSION, ExtensionResolver } from '../src/artifacts';

describe('ExtensionResolver', () => {
  describe('resolve', () => {
    it('should let the URL win over the MIME hint', () => {
      expect(ExtensionResolver.resolve('https://x/a.png?x=1', 'image/jpeg')).toBe('png');
    });

    it('should fall back to the MIME hint', () => {
      expect(ExtensionResolver.resolve('https://x/a', 'image/jpeg')).toBe('jpg');
    });

    it('should fall back to bin without a usable hint', () => {
      expect(ExtensionResolver.resolve('https://x/a')).toBe('bin');
      expect(ExtensionResolver.resolve('https://x/a', 'application/octet-stream')).toBe('bin');
      expect(DEFAULT_EXTENSION).toBe('bin');
    });

    it('should lowercase extensions found in the URL', () => {
      expect(ExtensionResolver.resolve('https://x/A.JPEG')).toBe('jpeg');
      expect(ExtensionResolver.resolve('https://x/clip.MP4')).toBe('mp4');
    });

    it('should ignore query strings and fragments', () => {
      expect(ExtensionResolver.resolve('https://x/a.gif#frame')).toBe('gif');
      expect(ExtensionResolver.resolve('https://x/view.php?file=b.png')).toBe('bin');
    });

    it('should only look at the last path segment', () => {
      expect(ExtensionResolver.resolve('https://x/dir.png/file', 'video/webm')).toBe('webm');
    });

    it('should not treat a dotfile as an extension', () => {
      expect(ExtensionResolver.resolve('https://x/.png')).toBe('bin');
    });

    it('should normalize MIME hints before mapping them', () => {
      expect(ExtensionResolver.resolve('https://x/a', 'Image/PNG; charset=binary')).toBe('png');
      expect(ExtensionResolver.resolve('https://x/a', 'video/quicktime')).toBe('mov');
      expect(ExtensionResolver.resolve('https://x/a', 'png')).toBe('png');
    });

    it('should always return a lowercase alphanumeric extension', () => {
      fc.assert(
        fc.property(fc.string(), fc.option(fc.string(), { nil: undefined }), (url, mime) => {
          expect(ExtensionResolver.resolve(url, mime)).toMatch(/^[a-z0-9]+$/);
        }),
        { numRuns: 200 },
      );
    });
  });

  describe('normalizeMime', () => {
    it('should drop parameters and lowercase', () => {
      expect(ExtensionResolver.normalizeMime(' VIDEO/MP4 ;codecs=avc1')).toBe('video/mp4');
    });

    it('should expand bare formats to image types', () => {
      expect(ExtensionResolver.normalizeMime('jpeg')).toBe('image/jpeg');
      expect(ExtensionResolver.normalizeMime('jpg')).toBe('image/jpeg');
      expect(ExtensionResolver.normalizeMime('svg')).toBe('image/svg+xml');
      expect(ExtensionResolver.normalizeMime('webp')).toBe('image/webp');
    });

    it('should leave an empty hint empty', () => {
      expect(ExtensionResolver.normalizeMime('  ')).toBe('');
    });
  });
});
