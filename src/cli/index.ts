#!/usr/bin/env node
/**
 * kitchen-layout executable
 */

import { runCli } from './commands';
import { Logger } from '../algorithm/utils/logger';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    Logger.error('Unexpected failure', error);
    process.exitCode = 1;
  });
