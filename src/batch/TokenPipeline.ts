/**
 * TokenPipeline - Fetch metadata, then resolve and save artifacts,
 * for one token or a batch of them
 */

import { logger } from '../utils/logger';
import { InputValidator } from '../utils/InputValidator';
import { ResourceOrchestrator } from '../artifacts/core/ResourceOrchestrator';
import { ArtifactManifest, SelectionConfig } from '../artifacts/core/types';
import { MetadataFetcher } from '../metadata/AlchemyMetadataFetcher';
import { TokenReference } from './NftUrlParser';
import { TokenQueue } from './TokenQueue';

export interface TokenFailure extends TokenReference {
    error: string;
}

export interface BatchSummary {
    processed: number;
    failed: number;
    manifests: ArtifactManifest[];
    failures: TokenFailure[];
}

export class TokenPipeline {
    constructor(
        private readonly fetcher: MetadataFetcher,
        private readonly orchestrator: ResourceOrchestrator,
        private readonly queue: TokenQueue,
        private readonly selection: SelectionConfig,
    ) {}

    async processToken(reference: TokenReference): Promise<ArtifactManifest> {
        const { contractAddress, tokenId } = reference;
        logger.info('▶️ Processing token', { contractAddress, tokenId });

        const doc = await this.fetcher.fetch(contractAddress, tokenId);
        return this.orchestrator.resolveAndSave(doc, tokenId, contractAddress, this.selection);
    }

    /**
     * One token's failure is recorded and the batch carries on
     */
    async processBatch(references: TokenReference[]): Promise<BatchSummary> {
        const outcomes = await this.queue.run(references, (reference) => this.processToken(reference));

        const summary: BatchSummary = { processed: 0, failed: 0, manifests: [], failures: [] };
        for (const outcome of outcomes) {
            if (outcome.result) {
                summary.processed++;
                summary.manifests.push(outcome.result);
            } else {
                summary.failed++;
                summary.failures.push({
                    contractAddress: outcome.job.contractAddress,
                    tokenId: outcome.job.tokenId,
                    error: outcome.error ?? 'unknown error',
                });
            }
        }

        logger.info('📊 Batch finished', { processed: summary.processed, failed: summary.failed });
        return summary;
    }

    /**
     * Inclusive range of decimal token ids
     */
    async processRange(contractAddress: string, firstTokenId: string, lastTokenId: string): Promise<BatchSummary> {
        const references = InputValidator.expandRange(firstTokenId, lastTokenId).map((tokenId) => ({
            contractAddress,
            tokenId,
        }));
        return this.processBatch(references);
    }
}
