#!/usr/bin/env node
import { createProcessWatchIo, runWatch } from './watch.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

runWatch(process.argv.slice(2), createProcessWatchIo(controller.signal))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('signal-watch:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
