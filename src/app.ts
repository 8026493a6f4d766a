import { AppConfig } from './types/config';
import { AppContext } from './types/app';
import { requireApiKey } from './utils/config';
import { FileManager } from './utils/FileManager';
import { ArtifactWriter, HttpFetch } from './artifacts/writer/ArtifactWriter';
import { MediaSelector } from './artifacts/selection/MediaSelector';
import { ResourceOrchestrator } from './artifacts/core/ResourceOrchestrator';
import { AlchemyMetadataFetcher, MetadataFetcher } from './metadata/AlchemyMetadataFetcher';
import { TokenQueue } from './batch/TokenQueue';
import { TokenPipeline } from './batch/TokenPipeline';
import { SheetSource } from './batch/SheetSource';

export interface ComponentOverrides {
  fetch?: HttpFetch;
  fetcher?: MetadataFetcher;
}

/**
 * Wire every component from one configuration
 */
export function initializeComponents(
  config: AppConfig,
  overrides: ComponentOverrides = {},
): AppContext {
  const fileManager = new FileManager(config.outputDirectory);
  const writer = new ArtifactWriter(fileManager, {
    timeout: config.downloadTimeout,
    fetch: overrides.fetch,
  });
  const selector = new MediaSelector({
    preferGateway: config.preferGateway,
    duplicateMatch: config.duplicateMatch,
    ipfsGateway: config.ipfsGateway,
  });
  const orchestrator = new ResourceOrchestrator(selector, writer);

  const fetcher =
    overrides.fetcher ??
    new AlchemyMetadataFetcher(requireApiKey(config), config.provider, {
      timeout: config.downloadTimeout,
      fetch: overrides.fetch,
    });

  const queue = new TokenQueue(config.maxConcurrentTokens);
  const pipeline = new TokenPipeline(fetcher, orchestrator, queue, {
    downloadThumbnails: config.downloadThumbnails,
  });

  return {
    config,
    fileManager,
    queue,
    pipeline,
    sheetSource: new SheetSource({ fetch: overrides.fetch }),
  };
}
