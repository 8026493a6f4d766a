#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { loadConfig } from './utils/config';
import { initializeErrorReporting, logError, logger, logOperation } from './utils/logger';
import { InputValidator } from './utils/InputValidator';
import { ConfigurationError, errorMessage, InvalidInputError } from './artifacts/core/errors';
import { initializeComponents } from './app';

const USAGE = `Usage: token-artifacts-sheet <sheetUrl> [--start N] [--count N]

The spreadsheet should contain NFT URLs in one of these formats:
  - OpenSea: https://opensea.io/assets/ethereum/0xCONTRACT/TOKEN
  - Rarible: https://rarible.com/token/0xCONTRACT:TOKEN
  - Direct: 0xCONTRACT/TOKEN or 0xCONTRACT TOKEN`;

interface SheetArguments {
  url: string;
  start: number;
  count?: number;
}

function readArguments(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        start: { type: 'string' },
        count: { type: 'string' },
      },
    });
  } catch (error: unknown) {
    throw new InvalidInputError(`${errorMessage(error)}\n${USAGE}`);
  }
}

export function parseSheetArguments(argv: string[]): SheetArguments {
  const parsed = readArguments(argv);

  const [url] = parsed.positionals;
  if (!url) {
    throw new InvalidInputError(USAGE);
  }

  const start = parsed.values.start === undefined ? 1 : InputValidator.validatePositiveInteger(parsed.values.start);
  const count =
    parsed.values.count === undefined ? undefined : InputValidator.validatePositiveInteger(parsed.values.count);

  if (start === null || count === null) {
    throw new InvalidInputError(`--start and --count take positive integers\n${USAGE}`);
  }

  return { url, start, count };
}

async function main(): Promise<void> {
  initializeErrorReporting(process.env.SENTRY_DSN);

  const args = parseSheetArguments(process.argv.slice(2));
  logger.info('Google Sheets URL', { url: args.url, start: args.start, count: args.count ?? 'all' });

  const app = initializeComponents(loadConfig());
  const selection = await app.sheetSource.load(args.url, { start: args.start, count: args.count });
  const summary = await app.pipeline.processBatch(selection.references);

  logOperation('[SUMMARY] Sheet finished', {
    rows: selection.totalRows,
    processed: summary.processed,
    skipped: selection.skipped.length + summary.failed,
  });
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigurationError || error instanceof InvalidInputError) {
      logger.error(error.message);
    } else {
      logError(error instanceof Error ? error : new Error(String(error)));
    }
    process.exit(1);
  });
}
