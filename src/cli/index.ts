#!/usr/bin/env node
import { runSetMode } from './set-mode.js';

runSetMode(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('signal-mode:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
