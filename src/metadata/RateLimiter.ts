/**
 * RateLimiter - Keeps metadata requests under the provider's rate limit
 * Fixed one-second window; callers wait for the next window instead of
 * being rejected.
 */

import { logger } from '../utils/logger';

export class RateLimiter {
    private windowStart = 0;
    private windowCount = 0;
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        maxRequests: number,
        options: {
            windowMs?: number;
            now?: () => number;
            sleep?: (ms: number) => Promise<void>;
        } = {},
    ) {
        this.maxRequests = maxRequests;
        this.windowMs = options.windowMs || 1000;
        this.now = options.now || Date.now;
        this.sleep = options.sleep || ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    }

    /**
     * Check the current window, without recording a request
     */
    checkLimit(): { allowed: boolean; retryAfter?: number } {
        const now = this.now();

        // Reset window if expired
        if (now - this.windowStart >= this.windowMs) {
            this.windowStart = now;
            this.windowCount = 0;
        }

        if (this.windowCount >= this.maxRequests) {
            return { allowed: false, retryAfter: this.windowMs - (now - this.windowStart) };
        }

        return { allowed: true };
    }

    /**
     * Wait until a request slot is free, then take it
     */
    async acquire(): Promise<void> {
        let limit = this.checkLimit();

        while (!limit.allowed) {
            logger.debug('Provider rate limit reached, waiting', { retryAfter: limit.retryAfter });
            await this.sleep(limit.retryAfter ?? this.windowMs);
            limit = this.checkLimit();
        }

        this.windowCount++;
    }
}
