import {
  POOL_ABORTED,
  POOL_CLOSED,
  POOL_TASK_FAILED,
  Logs,
} from '../@log/index.js';
import type {LinkedAbortSignal} from '../@utils/index.js';
import {linkAbortSignals} from '../@utils/index.js';
import {CancelledError, PoolClosedError} from '../errors.js';

import type {FutureSettler} from './future.js';
import {Future} from './future.js';

export const QUEUE_CAPACITY_RATIO = 5;

export type Task<T> = (signal: AbortSignal) => Promise<T>;

export type WorkerPoolOptions = {
  concurrency: number;
  /**
   * Number of tasks allowed to wait for a worker, defaults to `concurrency *
   * QUEUE_CAPACITY_RATIO`. Further submissions wait for a queue slot.
   */
  queueCapacity?: number;
};

export type SubmitOptions = {
  signal?: AbortSignal;
};

type Job = {
  execute(signal: AbortSignal): Promise<void>;
  fail(error: unknown): void;
  linked: LinkedAbortSignal;
  done: Promise<void>;
  finish(): void;
};

type Admission = {
  job: Job;
  admit(): void;
  refuse(error: Error): void;
};

export class WorkerPool {
  readonly concurrency: number;
  readonly queueCapacity: number;

  private controller = new AbortController();

  private queue: Job[] = [];
  private admissions: Admission[] = [];

  private active = new Set<Job>();
  private outstanding = new Set<Job>();

  private closing = false;

  constructor({
    concurrency,
    queueCapacity = concurrency * QUEUE_CAPACITY_RATIO,
  }: WorkerPoolOptions) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Invalid worker pool concurrency ${concurrency}.`);
    }

    if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
      throw new RangeError(
        `Invalid worker pool queue capacity ${queueCapacity}.`,
      );
    }

    this.concurrency = concurrency;
    this.queueCapacity = queueCapacity;
  }

  get running(): number {
    return this.active.size;
  }

  get queued(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.closing;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Submits a task. Resolves with the task's future once the task has been
   * admitted into the queue, which waits while the queue is full.
   */
  async submit<T>(
    task: Task<T>,
    {signal}: SubmitOptions = {},
  ): Promise<Future<T>> {
    if (this.closing) {
      throw new PoolClosedError();
    }

    let settle!: FutureSettler<T>;

    const future = new Future<T>(settler => {
      settle = settler;
    });

    let finish!: () => void;

    const done = new Promise<void>(resolve => {
      finish = resolve;
    });

    const job: Job = {
      execute: async signal => {
        try {
          settle({fulfilled: true, value: await task(signal)});
        } catch (error) {
          if (!signal.aborted) {
            Logs.debug('pool', POOL_TASK_FAILED(error));
          }

          settle({fulfilled: false, error});
        }
      },
      fail: error => {
        settle({fulfilled: false, error});
      },
      linked: linkAbortSignals(this.controller.signal, signal),
      done,
      finish,
    };

    this.outstanding.add(job);

    if (this.admissions.length > 0 || this.queue.length >= this.queueCapacity) {
      await this.waitForAdmission(job, signal);
    } else {
      this.queue.push(job);
    }

    this.pump();

    return future;
  }

  /**
   * Resolves once every task submitted before this call has finished, whether
   * it succeeded, failed or got cancelled.
   */
  async waitIdle(): Promise<void> {
    await Promise.all(Array.from(this.outstanding, job => job.done));
  }

  /**
   * Cancels queued tasks, aborts the signal of running ones and refuses any
   * further submission. Futures of running tasks reject right away, while
   * `waitIdle()` still waits for the task bodies to return.
   */
  abort(reason?: unknown): void {
    if (this.aborted) {
      return;
    }

    this.closing = true;

    this.controller.abort(reason ?? new PoolClosedError());

    const error = new CancelledError(reason);

    for (const {job, refuse} of this.admissions.splice(0)) {
      refuse(new PoolClosedError());
      this.discard(job, error);
    }

    for (const job of this.queue.splice(0)) {
      this.discard(job, error);
    }

    for (const job of this.active) {
      job.fail(error);
    }

    Logs.debug('pool', POOL_ABORTED(this.active.size));
  }

  /**
   * Refuses further submissions and resolves after the outstanding tasks have
   * finished.
   */
  async close(): Promise<void> {
    this.closing = true;

    await this.waitIdle();

    Logs.debug('pool', POOL_CLOSED);
  }

  private waitForAdmission(
    job: Job,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.admissions.indexOf(admission);

        if (index >= 0) {
          this.admissions.splice(index, 1);
        }

        const error = new CancelledError(signal?.reason);

        this.discard(job, error);
        reject(error);
      };

      const admission: Admission = {
        job,
        admit: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        refuse: error => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };

      this.admissions.push(admission);

      signal?.addEventListener('abort', onAbort, {once: true});
    });
  }

  private pump(): void {
    for (;;) {
      if (this.active.size < this.concurrency) {
        const job = this.queue.shift();

        if (job) {
          this.start(job);
          continue;
        }
      }

      if (this.queue.length < this.queueCapacity) {
        const admission = this.admissions.shift();

        if (admission) {
          this.queue.push(admission.job);
          admission.admit();
          continue;
        }
      }

      break;
    }
  }

  private start(job: Job): void {
    if (job.linked.signal.aborted) {
      this.discard(job, new CancelledError(job.linked.signal.reason));
      return;
    }

    this.active.add(job);

    void job.execute(job.linked.signal).finally(() => {
      this.active.delete(job);
      this.discard(job);
      this.pump();
    });
  }

  private discard(job: Job, error?: Error): void {
    if (error) {
      job.fail(error);
    }

    job.linked.dispose();
    this.outstanding.delete(job);
    job.finish();
  }
}
