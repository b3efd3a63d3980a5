import type { IAction, IncomingBlock } from '@actionindex/types';
import { deriveActionId } from './action-id.js';
import { accountOf, txHashOf, uniquePresent } from './event-nodes.js';

/**
 * Build the type-independent part of an action from the block envelope.
 *
 * Every type-specific field starts out null; the variant normalizer for the
 * block type fills in what it knows.
 */
export function buildBaseAction(block: IncomingBlock, traceId: string): IAction {
    const txHashes = uniquePresent(block.eventNodes.map(txHashOf));

    return {
        traceId,
        actionId: deriveActionId(block),
        type: block.btype,
        txHashes,
        extendedTxHashes: [...txHashes],
        startLt: block.minLt,
        endLt: block.maxLt,
        startUtime: block.minUtime,
        endUtime: block.maxUtime,
        success: !block.failed,
        accounts: block.eventNodes.map(accountOf).filter((account): account is string => account !== null),
        source: null,
        sourceSecondary: null,
        destination: null,
        destinationSecondary: null,
        asset: null,
        assetSecondary: null,
        asset2: null,
        amount: null,
        value: null,
        opcode: null,
        details: null
    };
}
