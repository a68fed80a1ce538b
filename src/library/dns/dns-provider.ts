export type RecordType = 'A' | 'AAAA';

export type AddressFamily = 'ipv4' | 'ipv6';

export const ADDRESS_FAMILIES: readonly AddressFamily[] = ['ipv4', 'ipv6'];

export const RECORD_TYPE_BY_FAMILY: Record<AddressFamily, RecordType> = {
  ipv4: 'A',
  ipv6: 'AAAA',
};

/**
 * Time to live value standing for "automatic".
 */
export const TTL_AUTO = 1;

export type DNSRecord = {
  id: string;
  name: string;
  type: RecordType;
  content: string;
  /**
   * Undefined when the provider does not report the flag.
   */
  proxied: boolean | undefined;
  ttl: number;
};

export type DNSRecordInput = {
  name: string;
  type: RecordType;
  content: string;
  /**
   * Undefined leaves the provider default.
   */
  proxied: boolean | undefined;
};

export type DNSRecordChanges = {
  content: string;
  /**
   * Undefined keeps the current flag of the record.
   */
  proxied: boolean | undefined;
};

/**
 * Zone-scoped record operations the reconciliation engine relies on. Every
 * call takes a signal that aborts the underlying request.
 */
export type IDNSProvider = {
  readonly name: string;

  listZones(signal?: AbortSignal): Promise<string[]>;

  listRecords(
    zone: string,
    hostname: string,
    type: RecordType,
    signal?: AbortSignal,
  ): Promise<DNSRecord[]>;

  createRecord(
    zone: string,
    record: DNSRecordInput,
    signal?: AbortSignal,
  ): Promise<DNSRecord>;

  /**
   * Updates content and proxied flag of an existing record, keeping its
   * identifier, name, type and TTL.
   */
  updateRecord(
    zone: string,
    record: DNSRecord,
    changes: DNSRecordChanges,
    signal?: AbortSignal,
  ): Promise<DNSRecord>;
};

export type DNSProviderFactory = (options: {token: string}) => IDNSProvider;
