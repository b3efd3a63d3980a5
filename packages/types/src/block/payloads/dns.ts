import type { IAccountId } from '../../ledger/index.js';

/**
 * Value stored under a DNS record key, discriminated by its TL-B schema.
 */
export type DnsRecordValue =
    | { schema: 'DNSNextResolver'; address: IAccountId }
    | { schema: 'DNSSmcAddress'; address: IAccountId; flags: number }
    | { schema: 'DNSAdnlAddress'; address: Uint8Array; flags: number }
    | { schema: 'DNSText'; dnsText: string };

export type DnsValueSchema = DnsRecordValue['schema'];

export interface IDnsChangeRecordData {
    source: IAccountId | null;
    destination: IAccountId;
    /** sha256 of the record name */
    key: Uint8Array;
    value: DnsRecordValue;
}

export interface IDnsDeleteRecordData {
    source: IAccountId | null;
    destination: IAccountId;
    key: Uint8Array;
}

export interface IDnsRenewData {
    source: IAccountId | null;
    destination: IAccountId | null;
}
