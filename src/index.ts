#!/usr/bin/env node
import { main } from './cli/verify.js';
import { logger, serializeError } from './utils/logger.js';

try {
  process.exitCode = main(process.argv.slice(2));
} catch (e) {
  logger.error('Unexpected failure', { error: serializeError(e) });
  process.exitCode = 1;
}
