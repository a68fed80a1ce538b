import type {Configuration, DNSProviderFactory} from '../library/index.js';
import {
  ConfigStore,
  ConfigurationError,
  PoolClosedError,
  parseConfig,
} from '../library/index.js';

import {FakeDNSProvider, createDeferred, tick} from './@fakes.js';

function createConfig(overrides: Record<string, unknown> = {}): Configuration {
  return parseConfig({
    zone_id: 'test-zone',
    token: 'test-secret',
    domains: ['home.example.com'],
    ...overrides,
  });
}

function createProviderFactory(): {
  createProvider: DNSProviderFactory;
  tokens: string[];
} {
  const tokens: string[] = [];

  return {
    createProvider: ({token}) => {
      tokens.push(token);
      return new FakeDNSProvider();
    },
    tokens,
  };
}

test('reuses the provider and pool when their settings are unchanged', async () => {
  const {createProvider, tokens} = createProviderFactory();

  const store = new ConfigStore(createConfig(), {createProvider});

  const initial = store.generation;

  await store.replace(createConfig({frequency: '5m'}));

  expect(store.get().frequency).toBe(300_000);
  expect(store.generation.id).toBe(initial.id + 1);
  expect(store.generation.provider).toBe(initial.provider);
  expect(store.generation.pool).toBe(initial.pool);
  expect(initial.pool.closed).toBe(false);
  expect(tokens).toEqual(['test-secret']);
});

test('rebuilds the provider and pool when their settings change', async () => {
  const {createProvider, tokens} = createProviderFactory();

  const store = new ConfigStore(createConfig(), {createProvider});

  const initial = store.generation;

  await store.replace(createConfig({token: 'test-secret-2', workers: 3}));

  expect(tokens).toEqual(['test-secret', 'test-secret-2']);
  expect(store.generation.provider).not.toBe(initial.provider);
  expect(store.generation.pool.concurrency).toBe(3);
  expect(initial.pool.closed).toBe(true);
});

test('keeps the previous generation when a replacement fails', async () => {
  let fail = false;

  const store = new ConfigStore(createConfig(), {
    createProvider: () => {
      if (fail) {
        throw new Error('cannot build client');
      }

      return new FakeDNSProvider();
    },
  });

  const initial = store.generation;

  await expect(store.replace(undefined)).rejects.toBeInstanceOf(
    ConfigurationError,
  );

  fail = true;

  await expect(
    store.replace(createConfig({token: 'test-secret-2'})),
  ).rejects.toBeInstanceOf(ConfigurationError);

  expect(store.generation).toBe(initial);
  expect(store.get().token).toBe('test-secret');
});

test('does not close a pool while a lease on its generation is held', async () => {
  const store = new ConfigStore(createConfig(), {
    createProvider: () => new FakeDNSProvider(),
  });

  const lease = store.acquire();

  const gate = createDeferred<string>();

  const future = await lease.generation.pool.submit(() => gate.promise);

  let replaced = false;

  const replacing = store
    .replace(createConfig({workers: 2}))
    .then(() => {
      replaced = true;
    });

  // The new generation is published right away.
  expect(store.generation).not.toBe(lease.generation);
  expect(store.generation.pool.concurrency).toBe(2);

  await tick();

  expect(replaced).toBe(false);
  expect(lease.generation.pool.closed).toBe(false);

  gate.resolve('settled');

  expect(await future.await()).toBe('settled');

  lease.release();
  lease.release();

  await replacing;

  expect(lease.generation.pool.closed).toBe(true);
});

test('waits for the pools of retiring generations to go idle', async () => {
  const store = new ConfigStore(createConfig(), {
    createProvider: () => new FakeDNSProvider(),
  });

  const lease = store.acquire();

  const gate = createDeferred();

  await lease.generation.pool.submit(() => gate.promise);

  const replacing = store.replace(createConfig({workers: 4}));

  let idle = false;

  const waiting = store.waitIdle().then(() => {
    idle = true;
  });

  await tick();

  expect(idle).toBe(false);

  gate.resolve();

  await waiting;

  expect(idle).toBe(true);

  lease.release();

  await replacing;

  expect(lease.generation.pool.closed).toBe(true);
});

test('aborts pools and refuses replacement after abort', async () => {
  const store = new ConfigStore(createConfig(), {
    createProvider: () => new FakeDNSProvider(),
  });

  const {pool} = store.generation;

  store.abort();

  expect(pool.aborted).toBe(true);

  await expect(pool.submit(async () => undefined)).rejects.toBeInstanceOf(
    PoolClosedError,
  );

  await expect(store.replace(createConfig())).rejects.toBeInstanceOf(
    ConfigurationError,
  );
});
