export { NftUrlParser } from './NftUrlParser';
export type { TokenReference } from './NftUrlParser';
export { SheetSource, selectReferences, toCsvExportUrl } from './SheetSource';
export type { SheetRowReference, SheetSelection, SheetSkip, SheetWindow } from './SheetSource';
export { TokenQueue } from './TokenQueue';
export type { QueueOutcome } from './TokenQueue';
export { TokenPipeline } from './TokenPipeline';
export type { BatchSummary, TokenFailure } from './TokenPipeline';
