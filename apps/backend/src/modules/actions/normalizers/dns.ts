import type { Block, DnsRecordValue, IChangeDnsRecordDetails } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { bytesToHex } from '../format.js';
import type { ActionPatch } from './types.js';

type RecordValueFields = Pick<IChangeDnsRecordDetails, 'address' | 'flags' | 'dnsText'>;

function describeRecordValue(value: DnsRecordValue): RecordValueFields {
    switch (value.schema) {
        case 'DNSNextResolver':
            return { address: value.address.toRawString(), flags: null, dnsText: null };
        case 'DNSSmcAddress':
            return { address: value.address.toRawString(), flags: value.flags, dnsText: null };
        case 'DNSAdnlAddress':
            return { address: bytesToHex(value.address), flags: value.flags, dnsText: null };
        case 'DNSText':
            return { address: null, flags: null, dnsText: value.dnsText };
    }
}

export function normalizeChangeDns(block: Block<'change_dns'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.source),
        destination: resolveAddress(data.destination),
        details: {
            kind: 'change_dns_record',
            valueSchema: data.value.schema,
            key: bytesToHex(data.key),
            ...describeRecordValue(data.value)
        }
    };
}

/**
 * Deletion is a change to an empty value.
 */
export function normalizeDeleteDns(block: Block<'delete_dns'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.source),
        destination: resolveAddress(data.destination),
        details: {
            kind: 'change_dns_record',
            valueSchema: null,
            flags: null,
            address: null,
            key: bytesToHex(data.key),
            dnsText: null
        }
    };
}

export function normalizeRenewDns(block: Block<'renew_dns'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.source),
        destination: resolveAddress(data.destination)
    };
}
