import winston from 'winston';
import * as Sentry from '@sentry/node';

// Alchemy carries the API key as a path segment
const API_KEY_IN_PATH = /(\/nft\/v\d+\/)[^/?#\s"]+/g;

export function redactSecrets(text: string): string {
  return text.replace(API_KEY_IN_PATH, '$1***');
}

/**
 * Masks credentials in the message and in string metadata
 */
const redact = winston.format((info) => {
  for (const key of Object.keys(info)) {
    const value = info[key];
    if (typeof value === 'string') {
      info[key] = redactSecrets(value);
    }
  }
  return info;
});

/**
 * Winston logger configuration for structured logging
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }
        return msg;
      }),
    ),
  }),
];

// Only add file transport outside of tests
if (process.env.NODE_ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: 'app.log' }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  format: winston.format.combine(
    redact(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'token-artifacts' },
  transports,
});

/**
 * Log a completed operation with its details
 */
export function logOperation(
  operation: string,
  details?: Record<string, unknown>,
): void {
  logger.info(operation, details);
}

/**
 * Log an error with stack trace and report it to Sentry
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}

/**
 * Enable Sentry reporting when a DSN is configured
 */
export function initializeErrorReporting(dsn: string | undefined): void {
  if (!dsn) {
    return;
  }
  Sentry.init({ dsn, tracesSampleRate: 0 });
  logger.debug('Sentry error reporting enabled');
}
