#!/usr/bin/env node
/**
 * tether CLI
 * Keeps the automation backend running and surfaces its event stream.
 */

import { createProgram } from './program.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cli');

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error('CLI failed', { error: String(err) });
    process.exitCode = 1;
  });
