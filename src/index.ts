#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './utils/config';
import { initializeErrorReporting, logError, logger, logOperation } from './utils/logger';
import { InputValidator } from './utils/InputValidator';
import { ConfigurationError, InvalidInputError } from './artifacts/core/errors';
import { initializeComponents } from './app';
import { Server } from './server';

const USAGE = 'Usage: token-artifacts [<contractAddress> <firstTokenId> [lastTokenId]]';

/**
 * Browse a token range given on the command line
 */
async function browseRange(args: string[]): Promise<void> {
  const [contractAddress, firstRaw, lastRaw = firstRaw] = args;
  const first = InputValidator.parseTokenId(firstRaw);
  const last = InputValidator.parseTokenId(lastRaw);

  if (!InputValidator.isContractAddress(contractAddress) || first === null || last === null) {
    throw new InvalidInputError(USAGE);
  }
  if (!InputValidator.validateRange(first, last)) {
    throw new InvalidInputError(`Invalid token range ${first}..${last}`);
  }

  const app = initializeComponents(loadConfig());
  const summary = await app.pipeline.processRange(contractAddress, first, last);

  logOperation('[SUMMARY] Range finished', {
    processed: summary.processed,
    failed: summary.failed,
  });
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

/**
 * Listen for range requests until interrupted
 */
async function listen(): Promise<void> {
  const app = initializeComponents(loadConfig());
  const server = new Server(app.pipeline, app.config.server);
  await server.start();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    app.queue.stop();
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError(error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  initializeErrorReporting(process.env.SENTRY_DSN);

  const args = process.argv.slice(2);
  if (args.length === 0) {
    await listen();
  } else {
    await browseRange(args);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError || error instanceof InvalidInputError) {
    logger.error(error.message);
  } else {
    logError(error instanceof Error ? error : new Error(String(error)));
  }
  process.exit(1);
});
