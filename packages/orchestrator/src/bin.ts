#!/usr/bin/env node
import { describeError } from '@stress-bridge/utils';
import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error('Error:', describeError(err));
    process.exit(1);
  });
