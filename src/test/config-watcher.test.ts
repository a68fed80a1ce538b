import * as FS from 'fs/promises';
import * as OS from 'os';
import * as Path from 'path';

import {
  LatestSignal,
  signatureChanged,
  watchConfigFile,
} from '../library/index.js';

import {tick} from './@fakes.js';

describe('LatestSignal', () => {
  test('collapses raises into a single pending signal', async () => {
    const signal = new LatestSignal();

    signal.raise();
    signal.raise();

    expect(signal.pending).toBe(true);
    expect(await signal.wait()).toBe(true);
    expect(signal.pending).toBe(false);

    let consumed: boolean | undefined;

    void signal.wait().then(raised => {
      consumed = raised;
    });

    await tick();

    expect(consumed).toBeUndefined();

    signal.raise();

    await tick();

    expect(consumed).toBe(true);
    expect(signal.pending).toBe(false);
  });

  test('resolves waits with false once closed or aborted', async () => {
    const signal = new LatestSignal();

    const controller = new AbortController();

    const aborted = signal.wait(controller.signal);

    controller.abort();

    expect(await aborted).toBe(false);

    const waiting = signal.wait();

    signal.close();

    expect(await waiting).toBe(false);
    expect(await signal.wait()).toBe(false);
    expect(signal.closed).toBe(true);

    signal.raise();

    expect(signal.pending).toBe(false);
  });
});

test('detects newer, resized and replaced files', () => {
  const signature = {mtimeMs: 1000, size: 10, ino: 1};

  expect(signatureChanged(signature, {...signature})).toBe(false);
  expect(signatureChanged(signature, {...signature, mtimeMs: 999})).toBe(false);
  expect(signatureChanged(signature, {...signature, mtimeMs: 1001})).toBe(true);
  expect(signatureChanged(signature, {...signature, size: 11})).toBe(true);
  expect(signatureChanged(signature, {...signature, ino: 2})).toBe(true);
});

describe('watchConfigFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await FS.mkdtemp(Path.join(OS.tmpdir(), 'ddns-sync-'));
  });

  afterEach(async () => {
    await FS.rm(directory, {recursive: true, force: true});
  });

  test('signals changes after the baseline', async () => {
    const path = Path.join(directory, 'config.yaml');

    await FS.writeFile(path, 'zone_id: a\n');

    const controller = new AbortController();

    const changes = watchConfigFile(path, {
      interval: 10,
      signal: controller.signal,
    });

    await tick(50);

    expect(changes.pending).toBe(false);

    await FS.writeFile(path, 'zone_id: changed\n');

    expect(await changes.wait()).toBe(true);

    controller.abort();

    expect(changes.closed).toBe(true);
    expect(await changes.wait()).toBe(false);
  });

  test('keeps polling while the file is missing', async () => {
    const path = Path.join(directory, 'config.yaml');

    const controller = new AbortController();

    const changes = watchConfigFile(path, {
      interval: 10,
      signal: controller.signal,
    });

    await tick(50);

    // First readable signature is the baseline.
    await FS.writeFile(path, 'zone_id: a\n');

    await tick(50);

    expect(changes.pending).toBe(false);

    await FS.writeFile(path, 'zone_id: longer\n');

    expect(await changes.wait()).toBe(true);

    controller.abort();
  });
});
