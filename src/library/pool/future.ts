import {toAbortError} from '../@utils/index.js';

export type FutureOutcome<T> =
  | {fulfilled: true; value: T}
  | {fulfilled: false; error: unknown};

export type FutureSettler<T> = (outcome: FutureOutcome<T>) => boolean;

/**
 * Handle to the eventual result of a task submitted to a `WorkerPool`. A
 * future settles exactly once; later settle attempts are ignored.
 */
export class Future<T> {
  private outcome: FutureOutcome<T> | undefined;

  private listeners: ((outcome: FutureOutcome<T>) => void)[] = [];

  constructor(executor: (settle: FutureSettler<T>) => void) {
    executor(outcome => {
      if (this.outcome) {
        return false;
      }

      this.outcome = outcome;

      const listeners = this.listeners;

      this.listeners = [];

      for (const listener of listeners) {
        listener(outcome);
      }

      return true;
    });
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * Waits for the task result. If `signal` aborts first, rejects right away
   * with `CancelledError` while the task itself keeps its own course.
   */
  await(signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const deliver = (outcome: FutureOutcome<T>): void => {
        if (outcome.fulfilled) {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      };

      if (this.outcome) {
        deliver(this.outcome);
        return;
      }

      if (signal?.aborted) {
        reject(toAbortError(signal.reason));
        return;
      }

      const onAbort = (): void => {
        this.listeners = this.listeners.filter(item => item !== listener);
        reject(toAbortError(signal?.reason));
      };

      const listener = (outcome: FutureOutcome<T>): void => {
        signal?.removeEventListener('abort', onAbort);
        deliver(outcome);
      };

      this.listeners.push(listener);

      signal?.addEventListener('abort', onAbort, {once: true});
    });
  }
}
