import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import type { ActionPatch, INormalizerContext } from './types.js';

export function normalizeMultisigCreateOrder(block: Block<'multisig_create_order'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.createdBy),
        destination: ctx.expectAddress(data.multisig, 'multisig'),
        destinationSecondary: resolveAddress(data.orderContractAddress),
        details: {
            kind: 'multisig_create_order',
            queryId: data.queryId.toString(),
            orderSeqno: data.orderSeqno.toString(),
            isCreatedBySigner: data.isCreatedBySigner,
            isSignedByCreator: data.creatorApproved,
            creatorIndex: data.creatorIndex,
            expirationDate: data.expirationDate,
            orderBoc: data.orderBoc
        }
    };
}

/**
 * The approval message can bounce off an order that already executed; the
 * block reports whether the signature was actually recorded.
 */
export function normalizeMultisigApprove(block: Block<'multisig_approve'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.signer),
        destination: resolveAddress(data.order),
        success: data.success,
        details: {
            kind: 'multisig_approve',
            signerIndex: data.signerIndex,
            exitCode: data.exitCode
        }
    };
}
