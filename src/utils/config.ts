import { z } from 'zod';
import { AppConfig } from '../types/config';
import { ConfigurationError } from '../artifacts/core/errors';
import { DEFAULT_IPFS_GATEWAY, DuplicateMatchMode } from '../artifacts/selection/policy';

const TRUE_VALUES = ['true', '1', 'yes'];

const flag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((value) => TRUE_VALUES.includes(value.trim().toLowerCase()));

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const EnvSchema = z.object({
  ALCHEMY_API_KEY: z.string().optional(),
  ALCHEMY_NETWORK: z.string().default('eth-mainnet'),
  DOWNLOAD_THUMBNAILS: flag('true'),
  OUTPUT_DIRECTORY: z.string().default('artwork'),
  DOWNLOAD_TIMEOUT: positiveInt(60000),
  MAX_CONCURRENT_TOKENS: positiveInt(2),
  API_REQUESTS_PER_SECOND: positiveInt(5),
  RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(2),
  PREFER_GATEWAY: flag('true'),
  DUPLICATE_MATCH: z.nativeEnum(DuplicateMatchMode).default(DuplicateMatchMode.HOST_STRIPPED),
  IPFS_GATEWAY: z.string().url().default(DEFAULT_IPFS_GATEWAY),
  HOST: z.string().default('localhost'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3128),
});

/**
 * Load configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      defined[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.path.join('.'), issue.message);
  }

  const vars = parsed.data;

  return {
    provider: {
      apiKey: vars.ALCHEMY_API_KEY,
      network: vars.ALCHEMY_NETWORK,
      requestsPerSecond: vars.API_REQUESTS_PER_SECOND,
      retryAttempts: vars.RETRY_ATTEMPTS,
    },
    server: {
      host: vars.HOST,
      port: vars.PORT,
    },
    outputDirectory: vars.OUTPUT_DIRECTORY,
    downloadThumbnails: vars.DOWNLOAD_THUMBNAILS,
    downloadTimeout: vars.DOWNLOAD_TIMEOUT,
    maxConcurrentTokens: vars.MAX_CONCURRENT_TOKENS,
    preferGateway: vars.PREFER_GATEWAY,
    duplicateMatch: vars.DUPLICATE_MATCH,
    ipfsGateway: vars.IPFS_GATEWAY,
  };
}

/**
 * The provider credential is only needed once metadata is fetched
 */
export function requireApiKey(config: AppConfig): string {
  if (!config.provider.apiKey) {
    throw new ConfigurationError('ALCHEMY_API_KEY', 'not set (add it to .env)');
  }
  return config.provider.apiKey;
}
