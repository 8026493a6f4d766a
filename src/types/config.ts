import { DuplicateMatchMode } from '../artifacts/selection/policy';

export interface ProviderConfig {
  apiKey?: string;
  network: string;
  requestsPerSecond: number;
  retryAttempts: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  provider: ProviderConfig;
  server: ServerConfig;
  outputDirectory: string;
  downloadThumbnails: boolean;
  downloadTimeout: number;
  maxConcurrentTokens: number;
  preferGateway: boolean;
  duplicateMatch: DuplicateMatchMode;
  ipfsGateway: string;
}
