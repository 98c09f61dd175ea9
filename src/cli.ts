#!/usr/bin/env node

import { runCli } from './cli/index.js';
import { exitCodeFor } from './utils/errors.js';
import { log } from './utils/logger.js';

runCli()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    log.error('Fatal error', error);
    process.exit(exitCodeFor(error));
  });
