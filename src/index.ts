#!/usr/bin/env node

import { run } from './cli.js';
import { safeLog } from './config.js';
import { logger } from './logging/index.js';

run(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    safeLog.error('Fatal error:', String(error));
    process.exitCode = 1;
  })
  .finally(() => {
    logger.close();
  });
