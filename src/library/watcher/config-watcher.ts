import * as FS from 'fs/promises';

import ms from 'ms';

import {
  WATCHER_CHANGE_DETECTED,
  WATCHER_STARTED,
  WATCHER_STAT_FAILED,
  WATCHER_STOPPED,
  Logs,
} from '../@log/index.js';

import {LatestSignal} from './latest-signal.js';

const WATCH_INTERVAL_DEFAULT = ms('1s');

export type FileSignature = {
  mtimeMs: number;
  size: number;
  ino: number;
};

export type WatchConfigFileOptions = {
  interval?: number;
  signal: AbortSignal;
};

export async function readFileSignature(path: string): Promise<FileSignature> {
  const {mtimeMs, size, ino} = await FS.stat(path);

  return {mtimeMs, size, ino};
}

export function signatureChanged(
  previous: FileSignature,
  current: FileSignature,
): boolean {
  return (
    current.mtimeMs > previous.mtimeMs ||
    current.size !== previous.size ||
    current.ino !== previous.ino
  );
}

/**
 * Polls the signature of the file at `path` and raises the returned signal
 * whenever it changes. The first readable signature is taken as the baseline.
 * Polls that fail to read the file are skipped. The signal gets closed once
 * `signal` aborts.
 */
export function watchConfigFile(
  path: string,
  {interval = WATCH_INTERVAL_DEFAULT, signal}: WatchConfigFileOptions,
): LatestSignal {
  const changes = new LatestSignal();

  let baseline: FileSignature | undefined;
  let polling = false;

  const poll = async (): Promise<void> => {
    let signature: FileSignature;

    try {
      signature = await readFileSignature(path);
    } catch (error) {
      Logs.debug('watcher', WATCHER_STAT_FAILED(path, error));
      return;
    }

    if (signal.aborted) {
      return;
    }

    if (baseline && signatureChanged(baseline, signature)) {
      Logs.debug('watcher', WATCHER_CHANGE_DETECTED(path));
      changes.raise();
    }

    baseline = signature;
  };

  const timer = setInterval(() => {
    if (polling) {
      return;
    }

    polling = true;

    void poll().finally(() => {
      polling = false;
    });
  }, interval);

  const stop = (): void => {
    clearInterval(timer);
    changes.close();
    Logs.debug('watcher', WATCHER_STOPPED(path));
  };

  if (signal.aborted) {
    stop();
    return changes;
  }

  signal.addEventListener('abort', stop, {once: true});

  Logs.debug('watcher', WATCHER_STARTED(path, interval));

  // Seed the baseline right away rather than one interval later.
  polling = true;

  void poll().finally(() => {
    polling = false;
  });

  return changes;
}
