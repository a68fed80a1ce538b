#!/usr/bin/env node

import {DRIVER_FATAL, Logs, isCancellation, run} from '../library/index.js';

const configPath: string | undefined = process.argv[2];

const controller = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => controller.abort());
}

try {
  await run({configPath, signal: controller.signal});
} catch (error) {
  if (!(controller.signal.aborted && isCancellation(error))) {
    Logs.error('driver', DRIVER_FATAL(error));
    process.exit(1);
  }
}
