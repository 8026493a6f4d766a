/**
 * AlchemyMetadataFetcher - Fetches one token's metadata document
 * from the Alchemy NFT API (v2 getNFTMetadata)
 */

import nodeFetch, { FetchError, Response } from 'node-fetch';
import { z } from 'zod';
import { logger, redactSecrets } from '../utils/logger';
import { retryWithBackoff } from '../utils/retryHelper';
import { JsonValue, MetadataDocument } from '../types/metadata';
import { ProviderConfig } from '../types/config';
import { HttpFetch } from '../artifacts/writer/ArtifactWriter';
import {
    errorMessage,
    NotFoundError,
    RateLimitError,
    UpstreamError,
} from '../artifacts/core/errors';
import { RateLimiter } from './RateLimiter';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.null(),
        z.boolean(),
        z.number(),
        z.string(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ]),
);

const MetadataDocumentSchema = z.record(JsonValueSchema);

export interface MetadataFetcher {
    fetch(contractAddress: string, tokenId: string): Promise<MetadataDocument>;
}

export interface AlchemyFetcherOptions {
    timeout?: number;
    fetch?: HttpFetch;
    rateLimiter?: RateLimiter;
    retryBaseDelay?: number;
}

export class AlchemyMetadataFetcher implements MetadataFetcher {
    private readonly apiKey: string;
    private readonly config: ProviderConfig;
    private readonly timeout: number;
    private readonly http: HttpFetch;
    private readonly rateLimiter: RateLimiter;
    private readonly retryBaseDelay: number;

    constructor(apiKey: string, config: ProviderConfig, options: AlchemyFetcherOptions = {}) {
        this.apiKey = apiKey;
        this.config = config;
        this.timeout = options.timeout || 30000;
        this.http = options.fetch || nodeFetch;
        this.rateLimiter = options.rateLimiter || new RateLimiter(config.requestsPerSecond);
        this.retryBaseDelay = options.retryBaseDelay ?? 1000;
    }

    buildUrl(contractAddress: string, tokenId: string): string {
        const params = new URLSearchParams({
            contractAddress,
            tokenId,
            refreshCache: 'false',
        });
        return `https://${this.config.network}.g.alchemy.com/nft/v2/${this.apiKey}/getNFTMetadata?${params.toString()}`;
    }

    /**
     * Fetch metadata; only provider rate limiting is retried
     */
    async fetch(contractAddress: string, tokenId: string): Promise<MetadataDocument> {
        return retryWithBackoff(() => this.fetchOnce(contractAddress, tokenId), {
            maxRetries: this.config.retryAttempts,
            baseDelay: this.retryBaseDelay,
            operationName: `getNFTMetadata ${contractAddress}/${tokenId}`,
            shouldRetry: (error) => error instanceof RateLimitError,
        });
    }

    private async fetchOnce(contractAddress: string, tokenId: string): Promise<MetadataDocument> {
        await this.rateLimiter.acquire();

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);
        const target = `${contractAddress}/${tokenId}`;

        try {
            let response: Response;
            try {
                response = await this.http(this.buildUrl(contractAddress, tokenId), {
                    headers: { Accept: 'application/json' },
                    signal: controller.signal,
                });
            } catch (error) {
                const reason = controller.signal.aborted ? `timed out after ${this.timeout}ms` : this.describeFailure(error);
                throw new UpstreamError(`Metadata request failed for ${target}: ${reason}`);
            }

            if (response.status === 404) {
                throw new NotFoundError(`No metadata for ${target}`);
            }
            if (response.status === 429) {
                throw new RateLimitError(`Provider rate limit hit for ${target}`);
            }
            if (!response.ok) {
                throw new UpstreamError(`Failed to fetch metadata for ${target}. Status: ${response.status}`, response.status);
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (error) {
                throw new UpstreamError(`Metadata for ${target} is not valid JSON: ${this.describeFailure(error)}`);
            }

            const parsed = MetadataDocumentSchema.safeParse(body);
            if (!parsed.success) {
                throw new UpstreamError(`Metadata for ${target} is not a JSON object`);
            }

            logger.debug('Fetched token metadata', { contractAddress, tokenId });
            return parsed.data;
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * node-fetch errors quote the request URL, which carries the API key
     */
    private describeFailure(error: unknown): string {
        if (error instanceof FetchError && error.code) {
            return error.code;
        }
        return redactSecrets(errorMessage(error));
    }
}
