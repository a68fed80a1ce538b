import {
  ENGINE_ADDRESS_CHANGED,
  ENGINE_ADDRESS_CLEARED,
  ENGINE_ADDRESS_RESOLUTION_FAILED,
  ENGINE_ADDRESS_UNCHANGED,
  ENGINE_CYCLE_SKIPPED,
  ENGINE_ZONE_CHECK_FAILED,
  ENGINE_ZONE_CREDENTIAL_REJECTED,
  ENGINE_ZONE_INVALID,
  RECORD_CREATED,
  RECORD_TASK_CANCELLED,
  RECORD_TASK_FAILED,
  RECORD_UNCHANGED,
  RECORD_UPDATED,
  RECORD_UPDATE_FAILED,
  Logs,
} from '../@log/index.js';
import type {RecordLogContext} from '../@log/index.js';
import {withTimeout} from '../@utils/index.js';
import type {ConfigStore, Domain, Generation} from '../config/index.js';
import type {AddressFamily, DNSRecord, RecordType} from '../dns/index.js';
import {ADDRESS_FAMILIES, RECORD_TYPE_BY_FAMILY} from '../dns/index.js';
import {DNSProviderAuthenticationError, isCancellation} from '../errors.js';
import type {Future} from '../pool/index.js';
import type {IPublicIPResolver} from '../resolver/index.js';
import {PublicIPResolver} from '../resolver/index.js';

export type ResolvedAddresses = Readonly<
  Record<AddressFamily, string | undefined>
>;

export type RecordAction = 'created' | 'updated' | 'unchanged';

export type RecordOutcome = {
  hostname: string;
  type: RecordType;
  action: RecordAction;
  /**
   * Identifiers of the records created or evaluated.
   */
  records: string[];
};

export type RecordFailure = {
  hostname: string;
  type: RecordType;
  error: unknown;
  cancelled: boolean;
};

export type CycleSkipReason = 'invalid-zone' | 'zone-check-failed';

export type CycleReport = {
  generation: number;
  skipped?: CycleSkipReason;
  addresses: ResolvedAddresses;
  outcomes: RecordOutcome[];
  failures: RecordFailure[];
};

export type ReconciliationEngineOptions = {
  resolver?: IPublicIPResolver;
};

type RecordTarget = {
  domain: Domain;
  type: RecordType;
  address: string;
};

/**
 * Whether an existing record already points at `address` with the wanted
 * proxied flag. An unspecified flag on either side matches any flag.
 */
export function recordMatches(
  record: DNSRecord,
  address: string,
  proxied: boolean | undefined,
): boolean {
  return (
    record.content === address &&
    (record.proxied === undefined ||
      proxied === undefined ||
      record.proxied === proxied)
  );
}

export class ReconciliationEngine {
  private resolver: IPublicIPResolver;

  private resolved: Record<AddressFamily, string | undefined> = {
    ipv4: undefined,
    ipv6: undefined,
  };

  constructor(
    private store: ConfigStore,
    {resolver = new PublicIPResolver()}: ReconciliationEngineOptions = {},
  ) {
    this.resolver = resolver;
  }

  /**
   * Addresses resolved by the latest cycle.
   */
  get addresses(): ResolvedAddresses {
    return {...this.resolved};
  }

  /**
   * Checks that the configured zone is visible to the credential. A rejected
   * credential yields `false`, other errors are thrown.
   */
  async validateZone(signal?: AbortSignal): Promise<boolean> {
    const lease = this.store.acquire();

    try {
      return await this.checkZone(lease.generation, signal);
    } finally {
      lease.release();
    }
  }

  /**
   * Runs one reconciliation cycle on the current generation, which stays
   * alive until every task of the cycle has settled.
   */
  async process(signal?: AbortSignal): Promise<CycleReport> {
    const lease = this.store.acquire();

    const {generation} = lease;

    try {
      const report: CycleReport = {
        generation: generation.id,
        addresses: this.addresses,
        outcomes: [],
        failures: [],
      };

      let valid: boolean;

      try {
        valid = await this.checkZone(generation, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }

        Logs.error('engine', ENGINE_ZONE_CHECK_FAILED(error));
        Logs.warn('engine', ENGINE_CYCLE_SKIPPED);

        return {...report, skipped: 'zone-check-failed'};
      }

      if (!valid) {
        Logs.warn('engine', ENGINE_CYCLE_SKIPPED);
        return {...report, skipped: 'invalid-zone'};
      }

      const addresses = await this.resolveAddresses(generation, signal);

      const targets: RecordTarget[] = [];

      for (const domain of generation.config.domains) {
        for (const family of ADDRESS_FAMILIES) {
          const address = addresses[family];

          if (address !== undefined) {
            targets.push({domain, type: RECORD_TYPE_BY_FAMILY[family], address});
          }
        }
      }

      const submissions = await Promise.allSettled(
        targets.map(target =>
          generation.pool.submit(
            taskSignal => this.reconcileRecord(generation, target, taskSignal),
            {signal},
          ),
        ),
      );

      const results = await Promise.allSettled(
        submissions.map(submission => awaitSubmission(submission, signal)),
      );

      for (const [index, result] of results.entries()) {
        const {
          domain: {hostname},
          type,
        } = targets[index];

        if (result.status === 'fulfilled') {
          report.outcomes.push(result.value);
          continue;
        }

        const error: unknown = result.reason;
        const cancelled = isCancellation(error);

        const context: RecordLogContext = {
          type: 'record',
          hostname,
          recordType: type,
        };

        if (cancelled) {
          Logs.warn(context, RECORD_TASK_CANCELLED);
        } else {
          Logs.error(context, RECORD_TASK_FAILED(error));
        }

        report.failures.push({hostname, type, error, cancelled});
      }

      return {...report, addresses};
    } finally {
      // Held until the task bodies of the cycle have returned.
      void generation.pool.waitIdle().finally(() => lease.release());
    }
  }

  waitIdle(): Promise<void> {
    return this.store.waitIdle();
  }

  private async checkZone(
    {config, provider, pool}: Generation,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const future = await pool.submit(
      taskSignal =>
        withTimeout(taskSignal, config.timeout, timeoutSignal =>
          provider.listZones(timeoutSignal),
        ),
      {signal},
    );

    let zones: string[];

    try {
      zones = await future.await(signal);
    } catch (error) {
      if (error instanceof DNSProviderAuthenticationError) {
        Logs.error('engine', ENGINE_ZONE_CREDENTIAL_REJECTED(error));
        return false;
      }

      throw error;
    }

    if (!zones.includes(config.zoneId)) {
      Logs.error('engine', ENGINE_ZONE_INVALID(config.zoneId));
      return false;
    }

    return true;
  }

  private async resolveAddresses(
    {config, pool}: Generation,
    signal: AbortSignal | undefined,
  ): Promise<ResolvedAddresses> {
    const families = ADDRESS_FAMILIES.filter(family => config[family]);

    for (const family of ADDRESS_FAMILIES) {
      if (!config[family]) {
        this.resolved[family] = undefined;
      }
    }

    const futures = await Promise.allSettled(
      families.map(family =>
        pool.submit(taskSignal => this.resolver.resolve(family, taskSignal), {
          signal,
        }),
      ),
    );

    await Promise.all(
      families.map(async (family, index) => {
        let address: string;

        try {
          address = await awaitSubmission(futures[index], signal);
        } catch (error) {
          Logs.error('engine', ENGINE_ADDRESS_RESOLUTION_FAILED(family, error));

          if (this.resolved[family] !== undefined) {
            Logs.warn('engine', ENGINE_ADDRESS_CLEARED(family));
          }

          this.resolved[family] = undefined;
          return;
        }

        if (this.resolved[family] === address) {
          Logs.debug('engine', ENGINE_ADDRESS_UNCHANGED(family, address));
        } else {
          Logs.info('engine', ENGINE_ADDRESS_CHANGED(family, address));
        }

        this.resolved[family] = address;
      }),
    );

    return this.addresses;
  }

  private async reconcileRecord(
    {config: {zoneId, timeout}, provider}: Generation,
    {domain: {hostname, proxied}, type, address}: RecordTarget,
    signal: AbortSignal,
  ): Promise<RecordOutcome> {
    const records = await withTimeout(signal, timeout, timeoutSignal =>
      provider.listRecords(zoneId, hostname, type, timeoutSignal),
    );

    if (records.length === 0) {
      const record = await withTimeout(signal, timeout, timeoutSignal =>
        provider.createRecord(
          zoneId,
          {name: hostname, type, content: address, proxied},
          timeoutSignal,
        ),
      );

      Logs.info(
        {type: 'record', hostname, recordType: type, id: record.id},
        RECORD_CREATED(record.content, record.proxied),
      );

      return {hostname, type, action: 'created', records: [record.id]};
    }

    let updated = false;

    const errors: unknown[] = [];

    for (const record of records) {
      const context: RecordLogContext = {
        type: 'record',
        hostname,
        recordType: type,
        id: record.id,
      };

      if (recordMatches(record, address, proxied)) {
        Logs.debug(context, RECORD_UNCHANGED(record.content));
        continue;
      }

      try {
        const result = await withTimeout(signal, timeout, timeoutSignal =>
          provider.updateRecord(
            zoneId,
            record,
            {content: address, proxied},
            timeoutSignal,
          ),
        );

        Logs.info(
          context,
          RECORD_UPDATED(record.content, result.content, result.proxied),
        );

        updated = true;
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }

        Logs.error(context, RECORD_UPDATE_FAILED(error));
        errors.push(error);
      }
    }

    if (errors.length === 1) {
      throw errors[0];
    }

    if (errors.length > 1) {
      throw new AggregateError(
        errors,
        `Failed to update ${errors.length} ${type} records of ${hostname}.`,
      );
    }

    return {
      hostname,
      type,
      action: updated ? 'updated' : 'unchanged',
      records: records.map(record => record.id),
    };
  }
}

function awaitSubmission<T>(
  submission: PromiseSettledResult<Future<T>>,
  signal: AbortSignal | undefined,
): Promise<T> {
  return submission.status === 'fulfilled'
    ? submission.value.await(signal)
    : Promise.reject(submission.reason);
}
