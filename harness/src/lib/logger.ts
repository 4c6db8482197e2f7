import pino from 'pino';
import type { HarnessMode } from '@fixture-harness/shared';
import { config } from './config.js';

// Logs go to stderr, the wrapped command owns stdout
export const logger = pino(
  {
    level: config.logLevel,
    name: 'fixture-harness',
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Redact credential-like fields
    redact: {
      paths: [
        'authorization',
        'Authorization',
        'credentials',
        'accessKeyId',
        'secretAccessKey',
        'sessionToken',
        '*.SecretAccessKey',
        '*.SessionToken',
      ],
      censor: '[REDACTED]',
    },
  },
  pino.destination(2)
);

// Create child logger with session context
export function createSessionLogger(sessionId: string, mode: HarnessMode) {
  return logger.child({ sessionId, mode });
}

export type Logger = typeof logger;
