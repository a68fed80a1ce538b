import * as Net from 'net';

import IPMatching from 'ip-matching';
import _ from 'lodash';
import ms from 'ms';

import {
  RESOLVER_INVALID_RESPONSE,
  RESOLVER_RESOLVED,
  RESOLVER_SERVICE_FAILED,
  RESOLVER_UNEXPECTED_STATUS,
  Logs,
} from '../@log/index.js';
import {linkTimeout, toAbortError} from '../@utils/index.js';
import type {AddressFamily} from '../dns/index.js';
import {NoAddressAvailableError} from '../errors.js';

import {PUBLIC_IP_SERVICES_DEFAULT} from './services.js';

const REQUEST_TIMEOUT_DEFAULT = ms('5s');

/**
 * Longest response body taken into account, a textual IPv6 address with a
 * trailing newline fits well within.
 */
const RESPONSE_TEXT_LIMIT = 128;

const IP_VERSION_BY_FAMILY: Record<AddressFamily, 4 | 6> = {
  ipv4: 4,
  ipv6: 6,
};

export type FetchResponse = {
  status: number;
  body: ReadableStream<Uint8Array> | null;
};

export type Fetch = (
  url: string,
  init: {signal: AbortSignal},
) => Promise<FetchResponse>;

export type PublicIPResolverOptions = {
  services?: Partial<Record<AddressFamily, string[]>>;
  /**
   * Time limit of a single service request.
   */
  timeout?: number;
  fetch?: Fetch;
  /**
   * Orders the services before each resolution, defaults to a random
   * shuffle.
   */
  shuffle?: (services: string[]) => string[];
};

export interface IPublicIPResolver {
  resolve(family: AddressFamily, signal?: AbortSignal): Promise<string>;
}

export class PublicIPResolver implements IPublicIPResolver {
  private services: Record<AddressFamily, string[]>;

  private timeout: number;

  private fetch: Fetch;

  private shuffle: (services: string[]) => string[];

  constructor({
    services = {},
    timeout = REQUEST_TIMEOUT_DEFAULT,
    fetch = globalThis.fetch,
    shuffle = _.shuffle,
  }: PublicIPResolverOptions = {}) {
    this.services = {...PUBLIC_IP_SERVICES_DEFAULT, ...services};
    this.timeout = timeout;
    this.fetch = fetch;
    this.shuffle = shuffle;
  }

  /**
   * Asks the services of the family one after another until one answers with
   * a valid address. A failing service is skipped, while an abort of `signal`
   * ends the resolution right away.
   */
  async resolve(family: AddressFamily, signal?: AbortSignal): Promise<string> {
    for (const service of this.shuffle([...this.services[family]])) {
      let text: string | undefined;

      try {
        text = await this.request(service, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw toAbortError(signal.reason);
        }

        Logs.warn('resolver', RESOLVER_SERVICE_FAILED(service, error));
        continue;
      }

      if (text === undefined) {
        continue;
      }

      const address = parseAddress(text, family);

      if (address === undefined) {
        Logs.warn('resolver', RESOLVER_INVALID_RESPONSE(service, text));
        continue;
      }

      Logs.debug('resolver', RESOLVER_RESOLVED(family, address, service));

      return address;
    }

    throw new NoAddressAvailableError(family);
  }

  private async request(
    service: string,
    signal: AbortSignal | undefined,
  ): Promise<string | undefined> {
    const linked = linkTimeout(signal, this.timeout);

    try {
      const {status, body} = await this.fetch(service, {
        signal: linked.signal,
      });

      if (status !== 200) {
        await body?.cancel();

        Logs.warn('resolver', RESOLVER_UNEXPECTED_STATUS(service, status));
        return undefined;
      }

      return (await readText(body, RESPONSE_TEXT_LIMIT)).trim();
    } finally {
      linked.dispose();
    }
  }
}

/**
 * Reads at most `limit` characters of the body and cancels the rest.
 */
async function readText(
  body: ReadableStream<Uint8Array> | null,
  limit: number,
): Promise<string> {
  if (!body) {
    return '';
  }

  const reader = body.getReader();
  const decoder = new TextDecoder();

  let text = '';

  try {
    while (text.length < limit) {
      const {done, value} = await reader.read();

      if (done) {
        break;
      }

      text += decoder.decode(value, {stream: true});
    }
  } finally {
    await reader.cancel();
  }

  return text.slice(0, limit);
}

/**
 * Parses a strict IP literal of the given family into its canonical text
 * form, returns undefined for anything else.
 */
export function parseAddress(
  text: string,
  family: AddressFamily,
): string | undefined {
  text = text.trim();

  if (Net.isIP(text) !== IP_VERSION_BY_FAMILY[family]) {
    return undefined;
  }

  return IPMatching.getIP(text)?.toString();
}
