/**
 * Single-slot notification cell. Raising an already pending signal is a
 * no-op: consumers only learn that something happened since they last
 * looked, not how many times.
 */
export class LatestSignal {
  private raised = false;
  private ended = false;

  private waiters = new Set<(raised: boolean) => void>();

  get pending(): boolean {
    return this.raised;
  }

  get closed(): boolean {
    return this.ended;
  }

  raise(): void {
    if (this.ended) {
      return;
    }

    const [waiter] = this.waiters;

    if (waiter) {
      this.waiters.delete(waiter);
      waiter(true);
    } else {
      this.raised = true;
    }
  }

  /**
   * Closes the cell, pending and future waits resolve with `false`. A signal
   * raised before closing is still delivered.
   */
  close(): void {
    if (this.ended) {
      return;
    }

    this.ended = true;

    for (const waiter of this.waiters) {
      waiter(false);
    }

    this.waiters.clear();
  }

  /**
   * Resolves `true` once the signal is raised, consuming it, or `false` if
   * the cell gets closed or `signal` aborts first.
   */
  wait(signal?: AbortSignal): Promise<boolean> {
    if (this.raised) {
      this.raised = false;
      return Promise.resolve(true);
    }

    if (this.ended || signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>(resolve => {
      const onAbort = (): void => {
        this.waiters.delete(waiter);
        resolve(false);
      };

      const waiter = (raised: boolean): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(raised);
      };

      this.waiters.add(waiter);

      signal?.addEventListener('abort', onAbort, {once: true});
    });
  }
}
