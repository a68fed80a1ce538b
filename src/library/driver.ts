import {
  DRIVER_CONFIG_CHANGED,
  DRIVER_CONFIG_RELOADED,
  DRIVER_CONFIG_RELOAD_FAILED,
  DRIVER_CYCLE_COMPLETED,
  DRIVER_CYCLE_STARTED,
  DRIVER_SHUTTING_DOWN,
  DRIVER_STARTED,
  DRIVER_STOPPED,
  Logs,
} from './@log/index.js';
import type {ConfigurationLoader} from './config/index.js';
import {
  ConfigStore,
  loadConfiguration as loadConfigurationDefault,
} from './config/index.js';
import type {DNSProviderFactory} from './dns/index.js';
import {ReconciliationEngine} from './engine/index.js';
import {ConfigurationError} from './errors.js';
import type {IPublicIPResolver} from './resolver/index.js';
import type {LatestSignal} from './watcher/index.js';
import {watchConfigFile} from './watcher/index.js';

export type RunOptions = {
  /**
   * Configuration file, searched from the working directory if omitted.
   */
  configPath?: string;
  signal: AbortSignal;
  watchInterval?: number;
  createProvider?: DNSProviderFactory;
  resolver?: IPublicIPResolver;
  loadConfiguration?: ConfigurationLoader;
};

export type NextEvent = 'timer' | 'change' | 'abort';

/**
 * Runs reconciliation cycles until `signal` aborts, every `frequency` of the
 * active configuration and right after the configuration file changes.
 *
 * Rejects on startup failures: an unreadable or invalid configuration, a DNS
 * provider client that cannot be built or a zone the credential cannot see.
 */
export async function run({
  configPath,
  signal,
  watchInterval,
  createProvider,
  resolver,
  loadConfiguration = loadConfigurationDefault,
}: RunOptions): Promise<void> {
  const {path, config} = await loadConfiguration(configPath);

  Logs.setVerbose(config.verbose);

  const store = new ConfigStore(config, {createProvider});
  const engine = new ReconciliationEngine(store, {resolver});

  try {
    if (!(await engine.validateZone(signal))) {
      throw new ConfigurationError(
        `Zone ${config.zoneId} is not accessible with the configured token.`,
      );
    }
  } catch (error) {
    store.abort(error);
    await store.waitIdle();
    throw error;
  }

  const changes = watchConfigFile(path, {interval: watchInterval, signal});

  Logs.info('driver', DRIVER_STARTED(path, config));

  while (!signal.aborted) {
    const startedAt = Date.now();

    Logs.debug('driver', DRIVER_CYCLE_STARTED);

    try {
      const report = await engine.process(signal);

      await engine.waitIdle();

      Logs.info('driver', DRIVER_CYCLE_COMPLETED(report, Date.now() - startedAt));
    } catch (error) {
      if (signal.aborted) {
        break;
      }

      throw error;
    }

    const event = await waitForNextEvent(store.get().frequency, changes, signal);

    if (event === 'change') {
      Logs.info('driver', DRIVER_CONFIG_CHANGED(path));

      try {
        const {config: nextConfig} = await loadConfiguration(path);

        await store.replace(nextConfig);

        Logs.setVerbose(nextConfig.verbose);
        Logs.info('driver', DRIVER_CONFIG_RELOADED);
      } catch (error) {
        Logs.error('driver', DRIVER_CONFIG_RELOAD_FAILED(error));
      }
    }
  }

  Logs.warn('driver', DRIVER_SHUTTING_DOWN);

  store.abort(signal.reason);

  await store.waitIdle();

  Logs.info('driver', DRIVER_STOPPED);
}

/**
 * Waits for whichever comes first: `frequency` elapsing, a configuration
 * change or `signal` aborting. A closed change signal leaves the other two.
 */
export async function waitForNextEvent(
  frequency: number,
  changes: LatestSignal,
  signal: AbortSignal,
): Promise<NextEvent> {
  if (signal.aborted) {
    return 'abort';
  }

  const controller = new AbortController();

  const onAbort = (): void => controller.abort();

  signal.addEventListener('abort', onAbort, {once: true});

  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      new Promise<NextEvent>(resolve => {
        timer = setTimeout(() => resolve('timer'), frequency);
      }),
      changes
        .wait(controller.signal)
        .then(
          (raised): Promise<NextEvent> =>
            raised ? Promise.resolve('change') : new Promise(() => {}),
        ),
      new Promise<NextEvent>(resolve => {
        if (controller.signal.aborted) {
          resolve('abort');
        } else {
          controller.signal.addEventListener('abort', () => resolve('abort'), {
            once: true,
          });
        }
      }),
    ]);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
    controller.abort();
  }
}
