import Cloudflare from 'cloudflare';

import {ConfigurationError, DNSProviderAuthenticationError} from '../../errors.js';
import type {
  DNSRecord,
  DNSRecordChanges,
  DNSRecordInput,
  IDNSProvider,
  RecordType,
} from '../dns-provider.js';
import {TTL_AUTO} from '../dns-provider.js';

const RECORDS_PER_PAGE = 100;

export type CloudflareDNSProviderOptions = {
  /**
   * Zone-scoped API token with DNS edit and zone read permissions.
   */
  token: string;
};

/**
 * Subset of the record shapes returned by the Cloudflare API.
 */
type CloudflareRecord = {
  id?: string;
  name?: string;
  type?: string;
  content?: string;
  proxied?: boolean;
  ttl?: number;
};

export class CloudflareDNSProvider implements IDNSProvider {
  readonly name = 'cloudflare';

  private cloudflare: Cloudflare;

  constructor({token}: CloudflareDNSProviderOptions) {
    token = token.trim();

    if (!token) {
      throw new ConfigurationError('Cloudflare API token is required.');
    }

    this.cloudflare = new Cloudflare({
      apiToken: token,
      // Retrying happens on the next cycle.
      maxRetries: 0,
    });
  }

  async listZones(signal?: AbortSignal): Promise<string[]> {
    const zoneIds: string[] = [];

    try {
      for await (const zone of this.cloudflare.zones.list({}, {signal})) {
        zoneIds.push(zone.id);
      }
    } catch (error) {
      throw translateError(error);
    }

    return zoneIds;
  }

  async listRecords(
    zone: string,
    hostname: string,
    type: RecordType,
    signal?: AbortSignal,
  ): Promise<DNSRecord[]> {
    const records: DNSRecord[] = [];

    try {
      const pages = this.cloudflare.dns.records.list(
        {
          zone_id: zone,
          type,
          name: {exact: hostname},
          per_page: RECORDS_PER_PAGE,
        },
        {signal},
      );

      for await (const record of pages) {
        records.push(toDNSRecord(record, type));
      }
    } catch (error) {
      throw translateError(error);
    }

    return records;
  }

  async createRecord(
    zone: string,
    {name, type, content, proxied}: DNSRecordInput,
    signal?: AbortSignal,
  ): Promise<DNSRecord> {
    const Records = this.cloudflare.dns.records;

    const body = {zone_id: zone, name, content, proxied, ttl: TTL_AUTO};

    try {
      switch (type) {
        case 'A':
          return toDNSRecord(
            await Records.create({...body, type: 'A'}, {signal}),
            type,
          );
        case 'AAAA':
          return toDNSRecord(
            await Records.create({...body, type: 'AAAA'}, {signal}),
            type,
          );
      }
    } catch (error) {
      throw translateError(error);
    }
  }

  async updateRecord(
    zone: string,
    {id, name, type, ttl}: DNSRecord,
    {content, proxied}: DNSRecordChanges,
    signal?: AbortSignal,
  ): Promise<DNSRecord> {
    const Records = this.cloudflare.dns.records;

    const body = {zone_id: zone, name, content, proxied, ttl};

    try {
      switch (type) {
        case 'A':
          return toDNSRecord(
            await Records.edit(id, {...body, type: 'A'}, {signal}),
            type,
          );
        case 'AAAA':
          return toDNSRecord(
            await Records.edit(id, {...body, type: 'AAAA'}, {signal}),
            type,
          );
      }
    } catch (error) {
      throw translateError(error);
    }
  }
}

export function toDNSRecord(
  {id, name, type, content, proxied, ttl}: CloudflareRecord,
  fallbackType: RecordType,
): DNSRecord {
  if (id === undefined) {
    throw new Error('Cloudflare returned a DNS record without identifier.');
  }

  return {
    id,
    name: name ?? '',
    type: type === 'A' || type === 'AAAA' ? type : fallbackType,
    content: content ?? '',
    proxied,
    ttl: ttl ?? TTL_AUTO,
  };
}

/**
 * Maps rejected credentials to `DNSProviderAuthenticationError`, other errors
 * pass through.
 */
export function translateError(error: unknown): unknown {
  if (
    error instanceof Cloudflare.APIError &&
    (error.status === 401 || error.status === 403)
  ) {
    return new DNSProviderAuthenticationError(error.message, {cause: error});
  }

  return error;
}
