#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stderr, exit as processExit } from 'node:process';
import { buildProgram, formatError } from './program.js';

process.on('uncaughtException', err => {
  stderr.write(formatError(err));
  processExit(1);
});

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    stderr.write(formatError(err));
    processExit(1);
  });
