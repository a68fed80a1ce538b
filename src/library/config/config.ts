import _ from 'lodash';
import ms from 'ms';
import * as x from 'x-value';

import {describeError} from '../@utils/index.js';
import {ConfigurationError} from '../errors.js';
import {Duration, parseDuration} from '../x.js';

export const FREQUENCY_DEFAULT = ms('1h');
export const FREQUENCY_MIN = ms('10s');

export const TIMEOUT_DEFAULT = ms('5s');
export const TIMEOUT_MIN = ms('1s');

export const WORKERS_DEFAULT = 10;
export const WORKERS_MIN = 1;
export const WORKERS_MAX = 64;

const DomainEntry = x.union([
  x.string,
  x.object({
    /**
     * Fully qualified hostname, e.g.: "home.example.com".
     */
    hostname: x.string,
    /**
     * Whether traffic goes through the Cloudflare proxy. Left out to keep the
     * current setting of existing records.
     */
    proxied: x.boolean.optional(),
  }),
]);

export const ConfigDocument = x.object({
  /**
   * Zone ID.
   */
  zone_id: x.string,
  /**
   * Zone-scoped API token.
   */
  token: x.string,
  frequency: Duration.optional(),
  /**
   * Time limit of every DNS API call.
   */
  timeout: Duration.optional(),
  workers: x.number.optional(),
  verbose: x.boolean.optional(),
  ipv4: x.boolean.optional(),
  ipv6: x.boolean.optional(),
  domains: x.array(DomainEntry),
});

export type ConfigDocument = x.TypeOf<typeof ConfigDocument>;

export type Domain = Readonly<{
  hostname: string;
  proxied: boolean | undefined;
}>;

export type Configuration = Readonly<{
  zoneId: string;
  token: string;
  frequency: number;
  timeout: number;
  workers: number;
  verbose: boolean;
  ipv4: boolean;
  ipv6: boolean;
  domains: readonly Domain[];
}>;

export function parseConfig(value: unknown): Configuration {
  let document: ConfigDocument;

  try {
    document = ConfigDocument.exact().satisfies(value);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid configuration: ${describeError(error)}`,
      {cause: error},
    );
  }

  return normalizeConfig(document);
}

/**
 * Applies defaults, floors and clamps, and checks the invariants of a
 * configuration document. The result is frozen.
 */
export function normalizeConfig({
  zone_id,
  token,
  frequency,
  timeout,
  workers = WORKERS_DEFAULT,
  verbose = false,
  ipv4,
  ipv6,
  domains: domainEntries,
}: ConfigDocument): Configuration {
  const zoneId = zone_id.trim();

  if (!zoneId) {
    throw new ConfigurationError('zone_id cannot be empty.');
  }

  token = token.trim();

  if (!token) {
    throw new ConfigurationError('token cannot be empty.');
  }

  // A family left out is on unless the other one is explicitly on.
  const ipv4Enabled = ipv4 ?? ipv6 !== true;
  const ipv6Enabled = ipv6 ?? ipv4 !== true;

  if (!ipv4Enabled && !ipv6Enabled) {
    throw new ConfigurationError('At least one of ipv4 and ipv6 must be on.');
  }

  const domains = _.uniqBy(
    domainEntries.map((entry, index): Domain => {
      const {hostname, proxied} =
        typeof entry === 'string' ? {hostname: entry, proxied: undefined} : entry;

      const normalizedHostname = normalizeHostname(hostname);

      if (!normalizedHostname) {
        throw new ConfigurationError(`domains[${index}]: empty hostname.`);
      }

      return Object.freeze({hostname: normalizedHostname, proxied});
    }),
    domain => domain.hostname,
  );

  if (domains.length === 0) {
    throw new ConfigurationError('domains cannot be empty.');
  }

  return Object.freeze({
    zoneId,
    token,
    frequency: Math.max(
      frequency === undefined ? FREQUENCY_DEFAULT : parseDuration(frequency),
      FREQUENCY_MIN,
    ),
    timeout: Math.max(
      timeout === undefined ? TIMEOUT_DEFAULT : parseDuration(timeout),
      TIMEOUT_MIN,
    ),
    workers: _.clamp(Math.floor(workers), WORKERS_MIN, WORKERS_MAX),
    verbose,
    ipv4: ipv4Enabled,
    ipv6: ipv6Enabled,
    domains: Object.freeze(domains),
  });
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}
