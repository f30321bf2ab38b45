#!/usr/bin/env node

import { createDefaultDeps, runCli } from './cli/run.js';
import { logger } from './logger.js';

const controller = new AbortController();
const interrupt = () => controller.abort();
process.on('SIGINT', interrupt);
process.on('SIGTERM', interrupt);

runCli(process.argv.slice(2), createDefaultDeps(controller.signal))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error({ err }, 'Unexpected failure');
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
