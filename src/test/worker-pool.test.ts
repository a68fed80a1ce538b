import {
  CancelledError,
  PoolClosedError,
  WorkerPool,
} from '../library/index.js';

import {createDeferred, tick, untilAborted} from './@fakes.js';

test('runs tasks up to the concurrency limit', async () => {
  const pool = new WorkerPool({concurrency: 2});

  const gates = [createDeferred(), createDeferred(), createDeferred()];

  const futures = await Promise.all(
    gates.map((gate, index) =>
      pool.submit(async () => {
        await gate.promise;
        return index;
      }),
    ),
  );

  expect(pool.running).toBe(2);
  expect(pool.queued).toBe(1);
  expect(pool.queueCapacity).toBe(10);

  gates[0].resolve();

  expect(await futures[0].await()).toBe(0);

  await tick();

  expect(pool.running).toBe(2);
  expect(pool.queued).toBe(0);

  gates[1].resolve();
  gates[2].resolve();

  expect(await Promise.all(futures.map(future => future.await()))).toEqual([
    0, 1, 2,
  ]);
});

test('makes submitters wait while the queue is full', async () => {
  const pool = new WorkerPool({concurrency: 1, queueCapacity: 1});

  const gate = createDeferred();

  const first = await pool.submit(() => gate.promise);
  await pool.submit(async () => 'second');

  let admitted = false;

  const third = pool.submit(async () => 'third').then(future => {
    admitted = true;
    return future;
  });

  await tick();

  expect(admitted).toBe(false);
  expect(pool.queued).toBe(1);

  gate.resolve();

  await first.await();

  expect(await (await third).await()).toBe('third');
  expect(admitted).toBe(true);
});

test('settles futures with task errors', async () => {
  const pool = new WorkerPool({concurrency: 1});

  const error = new Error('boom');

  const future = await pool.submit(async () => {
    throw error;
  });

  await expect(future.await()).rejects.toBe(error);

  // Awaiting again yields the same outcome.
  await expect(future.await()).rejects.toBe(error);
  expect(future.settled).toBe(true);
});

test('waits only for tasks submitted before waitIdle', async () => {
  const pool = new WorkerPool({concurrency: 2});

  const before = createDeferred();
  const after = createDeferred();

  const failing = await pool.submit(async () => {
    await before.promise;
    throw new Error('failed');
  });

  const idle = pool.waitIdle();

  const later = await pool.submit(() => after.promise);

  before.resolve();

  await idle;

  await expect(failing.await()).rejects.toThrow('failed');
  expect(later.settled).toBe(false);

  after.resolve();

  await pool.waitIdle();

  expect(later.settled).toBe(true);
});

test('rejects the awaiting caller at once when its signal aborts', async () => {
  const pool = new WorkerPool({concurrency: 1});

  const gate = createDeferred<string>();

  const future = await pool.submit(() => gate.promise);

  const controller = new AbortController();

  const awaiting = future.await(controller.signal);

  controller.abort();

  await expect(awaiting).rejects.toBeInstanceOf(CancelledError);

  expect(future.settled).toBe(false);

  gate.resolve('done');

  expect(await future.await()).toBe('done');
});

test('aborts running, queued and waiting submissions', async () => {
  const pool = new WorkerPool({concurrency: 1, queueCapacity: 1});

  const taskSignals: AbortSignal[] = [];

  let bodyReturned = false;

  const running = await pool.submit(async signal => {
    taskSignals.push(signal);

    try {
      await untilAborted(signal);
    } finally {
      await tick(10);
      bodyReturned = true;
    }
  });

  const queued = await pool.submit(async () => 'queued');

  const waiting = pool.submit(async () => 'waiting');

  await tick();

  pool.abort();

  expect(taskSignals.map(signal => signal.aborted)).toEqual([true]);
  expect(pool.aborted).toBe(true);
  expect(pool.queued).toBe(0);

  await expect(running.await()).rejects.toBeInstanceOf(CancelledError);
  await expect(queued.await()).rejects.toBeInstanceOf(CancelledError);
  await expect(waiting).rejects.toBeInstanceOf(PoolClosedError);

  await expect(pool.submit(async () => 'late')).rejects.toBeInstanceOf(
    PoolClosedError,
  );

  expect(bodyReturned).toBe(false);

  await pool.waitIdle();

  expect(bodyReturned).toBe(true);
});

test('closes after outstanding tasks finish', async () => {
  const pool = new WorkerPool({concurrency: 1});

  const gate = createDeferred();

  const future = await pool.submit(() => gate.promise);

  let closed = false;

  const closing = pool.close().then(() => {
    closed = true;
  });

  await expect(pool.submit(async () => undefined)).rejects.toBeInstanceOf(
    PoolClosedError,
  );

  await tick();

  expect(closed).toBe(false);

  gate.resolve();

  await closing;

  expect(future.settled).toBe(true);
  expect(pool.closed).toBe(true);

  await pool.close();
});

test('cancels a task whose submit signal aborts while queued', async () => {
  const pool = new WorkerPool({concurrency: 1});

  const gate = createDeferred();

  await pool.submit(() => gate.promise);

  const controller = new AbortController();

  const queued = await pool.submit(async () => 'never', {
    signal: controller.signal,
  });

  controller.abort();

  gate.resolve();

  await expect(queued.await()).rejects.toBeInstanceOf(CancelledError);

  await pool.waitIdle();
});

test('refuses invalid concurrency', () => {
  expect(() => new WorkerPool({concurrency: 0})).toThrow(RangeError);
});
