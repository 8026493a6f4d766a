export { AlchemyMetadataFetcher } from './AlchemyMetadataFetcher';
export type { MetadataFetcher, AlchemyFetcherOptions } from './AlchemyMetadataFetcher';
export { RateLimiter } from './RateLimiter';
