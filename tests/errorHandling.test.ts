import fc from 'fast-check';
import { retryWithBackoff } from '../src/utils/retryHelper';
import { DownloadError, errorMessage, RateLimitError, UpstreamError } from '../src/artifacts';
import { redactSecrets } from '../src/utils/logger';

describe('Property: Error Handling', () => {
  describe('retryWithBackoff', () => {
    it('should succeed once failures stay within the retry budget', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.integer({ min: 0, max: 4 }),
          fc.integer({ min: 0, max: 3 }),
          async (failuresBeforeSuccess, maxRetries) => {
            let attemptCount = 0;

            const operation = async () => {
              attemptCount++;
              if (attemptCount <= failuresBeforeSuccess) {
                throw new Error('Network timeout');
              }
              return 'success';
            };

            try {
              const result = await retryWithBackoff(operation, {
                maxRetries,
                baseDelay: 1,
                operationName: 'test-operation',
              });
              expect(failuresBeforeSuccess).toBeLessThanOrEqual(maxRetries);
              expect(result).toBe('success');
              expect(attemptCount).toBe(failuresBeforeSuccess + 1);
            } catch (error) {
              expect(failuresBeforeSuccess).toBeGreaterThan(maxRetries);
              expect(attemptCount).toBe(maxRetries + 1);
              expect(errorMessage(error)).toBe('Network timeout');
            }
          },
        ),
        { numRuns: 30 },
      );
    });

    it('should rethrow immediately when the error is not retryable', async () => {
      let attemptCount = 0;

      const failure = retryWithBackoff(
        async () => {
          attemptCount++;
          throw new UpstreamError('Server error', 500);
        },
        {
          maxRetries: 3,
          baseDelay: 1,
          operationName: 'metadata',
          shouldRetry: (error) => error instanceof RateLimitError,
        },
      );

      await expect(failure).rejects.toThrow(UpstreamError);
      expect(attemptCount).toBe(1);
    });
  });

  describe('error classes', () => {
    it('should carry their own names', () => {
      expect(new RateLimitError('slow down').name).toBe('RateLimitError');
      expect(new DownloadError('https://x/a.png', 404)).toBeInstanceOf(Error);
    });

    it('should describe download failures', () => {
      expect(new DownloadError('https://x/a.png', 404).message).toBe('Download failed with HTTP 404: https://x/a.png');
      expect(new DownloadError('https://x/a.png').message).toBe('Download failed: https://x/a.png');
      expect(new DownloadError('https://x/a.png', undefined, 'reset').message).toBe(
        'Download failed: https://x/a.png (reset)',
      );
    });

    it('should stringify anything thrown', () => {
      expect(errorMessage(new Error('x'))).toBe('x');
      expect(errorMessage('plain')).toBe('plain');
    });
  });

  describe('log redaction', () => {
    it('should mask the provider key in request URLs', () => {
      expect(
        redactSecrets(
          'request to https://eth-mainnet.g.alchemy.com/nft/v2/test-secret/getNFTMetadata?tokenId=1 failed',
        ),
      ).toBe('request to https://eth-mainnet.g.alchemy.com/nft/v2/***/getNFTMetadata?tokenId=1 failed');
    });

    it('should leave other text alone', () => {
      expect(redactSecrets('https://ipfs.io/ipfs/QmAbc')).toBe('https://ipfs.io/ipfs/QmAbc');
    });
  });
});
