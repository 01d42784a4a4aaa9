#!/usr/bin/env node
import { createLogger, describeError } from '@trialgrid/core';

import { createProgram } from './program.js';

const log = createLogger('cli');

const program = createProgram();
program.parseAsync(process.argv).catch((err: unknown) => {
  log.fatal({ err: describeError(err) }, 'trialgrid failed');
  process.exit(1);
});
