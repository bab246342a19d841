#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli';

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[Export] Fatal:', err);
    process.exitCode = 1;
  }
);
