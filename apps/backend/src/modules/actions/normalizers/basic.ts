import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString, stripNullChars } from '../format.js';
import type { ActionPatch, INormalizerContext } from './types.js';

/**
 * Generic contract interaction; deployments share the same shape.
 */
export function normalizeContractCall(block: Block<'call_contract' | 'contract_deploy'>): ActionPatch {
    const { data } = block;
    return {
        opcode: data.opcode,
        value: amountToString(data.value),
        source: resolveAddress(data.source),
        destination: resolveAddress(data.destination)
    };
}

export function normalizeTonTransfer(block: Block<'ton_transfer'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        value: amountToString(data.value),
        source: ctx.expectAddress(data.source, 'source'),
        destination: ctx.expectAddress(data.destination, 'destination'),
        details: {
            kind: 'ton_transfer',
            content: data.comment === null ? null : stripNullChars(data.comment),
            encrypted: data.encrypted
        }
    };
}
