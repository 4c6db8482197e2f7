#!/usr/bin/env node
import { AppError } from '../lib/errors.js';

// Configuration is read while the CLI loads; a bad environment is reported, not thrown
try {
  const { main } = await import('../handlers/cli.js');
  process.exitCode = await main();
} catch (error) {
  if (!(error instanceof AppError)) {
    throw error;
  }
  process.stderr.write(`${JSON.stringify(error.toReport())}\n`);
  process.exitCode = error.exitCode;
}
