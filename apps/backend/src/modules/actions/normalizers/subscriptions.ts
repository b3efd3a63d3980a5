import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch } from './types.js';

export function normalizeSubscribe(block: Block<'subscribe'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.subscriber),
        destination: resolveAddress(data.beneficiary),
        destinationSecondary: resolveAddress(data.subscription),
        amount: amountToString(data.amount)
    };
}

export function normalizeUnsubscribe(block: Block<'unsubscribe'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.subscriber),
        destination: resolveAddress(data.beneficiary),
        destinationSecondary: resolveAddress(data.subscription)
    };
}
