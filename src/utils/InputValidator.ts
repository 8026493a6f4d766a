import { logger } from './logger';

/**
 * InputValidator - Validates token references coming from requests,
 * arguments and spreadsheet cells
 */
export class InputValidator {
  /**
   * Parses a token id written in decimal or as 0x-prefixed hex
   * @param input - Raw token id
   * @returns Decimal string, or null if invalid
   */
  static parseTokenId(input: string | undefined | null): string | null {
    if (!input) {
      return null;
    }

    const trimmed = input.trim();

    if (/^0x[0-9a-f]+$/i.test(trimmed)) {
      return BigInt(trimmed).toString();
    }

    if (/^\d+$/.test(trimmed)) {
      return BigInt(trimmed).toString();
    }

    logger.debug('Invalid token id format', { input: trimmed });
    return null;
  }

  /**
   * Validates an EVM contract address (0x + 40 hex digits)
   * @param input - Contract address
   * @returns True if valid, false otherwise
   */
  static isContractAddress(input: string | undefined | null): boolean {
    return !!input && /^0x[0-9a-fA-F]{40}$/.test(input.trim());
  }

  /**
   * Validates numeric input within a range
   * @param input - Numeric input as string
   * @param min - Minimum allowed value
   * @param max - Maximum allowed value
   * @returns Parsed number or null if invalid
   */
  static validatePositiveInteger(
    input: string | undefined,
    min: number = 1,
    max: number = Number.MAX_SAFE_INTEGER,
  ): number | null {
    if (!input || !/^\d+$/.test(input.trim())) {
      return null;
    }

    const value = parseInt(input.trim(), 10);
    if (value < min || value > max) {
      logger.debug('Number out of valid range', { value, min, max });
      return null;
    }

    return value;
  }

  /**
   * Validates an inclusive token id range
   * @param first - Decimal first id
   * @param last - Decimal last id
   * @param maxSize - Largest number of ids allowed
   * @returns True if last >= first and the range is not too large
   */
  static validateRange(first: string, last: string, maxSize: number = 10000): boolean {
    const size = BigInt(last) - BigInt(first) + BigInt(1);
    return size >= BigInt(1) && size <= BigInt(maxSize);
  }

  /**
   * Expands an inclusive token id range
   * @param first - Decimal first id
   * @param last - Decimal last id
   * @returns Decimal ids in order, empty when last < first
   */
  static expandRange(first: string, last: string): string[] {
    const ids: string[] = [];
    for (let id = BigInt(first); id <= BigInt(last); id++) {
      ids.push(id.toString());
    }
    return ids;
  }
}
