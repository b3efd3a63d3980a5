import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch, INormalizerContext } from './types.js';

export function normalizeVestingSendMessage(block: Block<'vesting_send_message'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.sender),
        destination: ctx.expectAddress(data.vesting, 'vesting'),
        // recipient of the message the vesting wallet forwarded
        destinationSecondary: resolveAddress(data.messageDestination),
        amount: amountToString(data.messageValue),
        details: {
            kind: 'vesting_send_message',
            queryId: data.queryId.toString(),
            messageBoc: data.messageBoc
        }
    };
}

export function normalizeVestingAddWhitelist(block: Block<'vesting_add_whitelist'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.adder),
        destination: ctx.expectAddress(data.vesting, 'vesting'),
        details: {
            kind: 'vesting_add_whitelist',
            queryId: data.queryId.toString(),
            accountsAdded: data.accountsAdded.map(account => account.toRawString())
        }
    };
}
