import {
  CONFIG_GENERATION_PUBLISHED,
  CONFIG_GENERATION_RETIRED,
  CONFIG_STORE_ABORTED,
  Logs,
} from '../@log/index.js';
import type {DNSProviderFactory, IDNSProvider} from '../dns/index.js';
import {createDNSProvider} from '../dns/index.js';
import {ConfigurationError} from '../errors.js';
import {WorkerPool} from '../pool/index.js';

import type {Configuration} from './config.js';

/**
 * Immutable snapshot of everything a reconciliation cycle works with.
 */
export type Generation = Readonly<{
  id: number;
  config: Configuration;
  provider: IDNSProvider;
  pool: WorkerPool;
}>;

export type GenerationLease = {
  readonly generation: Generation;
  /**
   * Idempotent.
   */
  release(): void;
};

export type ConfigStoreOptions = {
  createProvider?: DNSProviderFactory;
};

class GenerationEntry {
  readonly drained: Promise<void>;

  private readers = 0;
  private retired = false;

  private drainedResolver: (() => void) | undefined;

  constructor(readonly generation: Generation) {
    this.drained = new Promise(resolve => {
      this.drainedResolver = resolve;
    });
  }

  acquire(): GenerationLease {
    this.readers++;

    let released = false;

    return {
      generation: this.generation,
      release: () => {
        if (released) {
          return;
        }

        released = true;
        this.readers--;
        this.checkDrained();
      },
    };
  }

  retire(): Promise<void> {
    this.retired = true;
    this.checkDrained();

    return this.drained;
  }

  private checkDrained(): void {
    if (this.retired && this.readers === 0 && this.drainedResolver) {
      this.drainedResolver();
      this.drainedResolver = undefined;
    }
  }
}

/**
 * Holds the active configuration along with the DNS provider client and
 * worker pool built for it. Readers lease the current generation for as long
 * as they use it, a replacement publishes a new generation at once and tears
 * the previous one down after its last lease is released.
 */
export class ConfigStore {
  private current: GenerationEntry;

  /**
   * Number of generations not yet drained per worker pool, a pool stays in
   * the map until it is closed.
   */
  private pools = new Map<WorkerPool, number>();

  private lastGenerationId = 0;

  private shutDown = false;

  private createProvider: DNSProviderFactory;

  constructor(
    config: Configuration,
    {createProvider = createDNSProvider}: ConfigStoreOptions = {},
  ) {
    this.createProvider = createProvider;
    this.current = this.build(config, undefined);
  }

  get(): Configuration {
    return this.current.generation.config;
  }

  get generation(): Generation {
    return this.current.generation;
  }

  acquire(): GenerationLease {
    return this.current.acquire();
  }

  /**
   * Publishes a generation built for `config`. The DNS provider client is
   * rebuilt only when the token changes and the worker pool only when the
   * worker count changes. When building fails the active generation stays.
   *
   * Resolves once the replaced generation is drained and its resources are
   * released.
   */
  async replace(config: Configuration | undefined): Promise<void> {
    if (!config) {
      throw new ConfigurationError('No configuration to apply.');
    }

    if (this.shutDown) {
      throw new ConfigurationError('Configuration store has been shut down.');
    }

    const previous = this.current;

    let next: GenerationEntry;

    try {
      next = this.build(config, previous.generation);
    } catch (error) {
      throw error instanceof ConfigurationError
        ? error
        : new ConfigurationError('Failed to build DNS provider client.', {
            cause: error,
          });
    }

    this.current = next;

    Logs.info(
      'config',
      CONFIG_GENERATION_PUBLISHED(
        next.generation.id,
        next.generation.provider !== previous.generation.provider,
        next.generation.pool !== previous.generation.pool,
      ),
    );

    await this.retire(previous);
  }

  /**
   * Resolves when the worker pools of the current and of every retiring
   * generation are idle.
   */
  async waitIdle(): Promise<void> {
    await Promise.all(Array.from(this.pools.keys(), pool => pool.waitIdle()));
  }

  /**
   * Aborts the worker pools of the current and every retiring generation and
   * refuses further replacement.
   */
  abort(reason?: unknown): void {
    this.shutDown = true;

    for (const pool of this.pools.keys()) {
      pool.abort(reason);
    }

    Logs.debug('config', CONFIG_STORE_ABORTED);
  }

  private build(
    config: Configuration,
    previous: Generation | undefined,
  ): GenerationEntry {
    const provider =
      previous && previous.config.token === config.token
        ? previous.provider
        : this.createProvider({token: config.token});

    const pool =
      previous &&
      previous.config.workers === config.workers &&
      !previous.pool.closed
        ? previous.pool
        : new WorkerPool({concurrency: config.workers});

    this.pools.set(pool, (this.pools.get(pool) ?? 0) + 1);

    return new GenerationEntry(
      Object.freeze({
        id: ++this.lastGenerationId,
        config,
        provider,
        pool,
      }),
    );
  }

  private async retire(entry: GenerationEntry): Promise<void> {
    await entry.retire();

    Logs.debug('config', CONFIG_GENERATION_RETIRED(entry.generation.id));

    await this.releasePool(entry.generation.pool);
  }

  /**
   * Closes the pool once no generation that has not drained uses it.
   */
  private async releasePool(pool: WorkerPool): Promise<void> {
    const users = (this.pools.get(pool) ?? 0) - 1;

    this.pools.set(pool, users);

    if (users > 0) {
      return;
    }

    try {
      await pool.close();
    } finally {
      this.pools.delete(pool);
    }
  }
}
