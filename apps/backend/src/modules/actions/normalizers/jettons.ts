import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString, bytesToBase64, decodeComment } from '../format.js';
import type { ActionPatch, INormalizerContext } from './types.js';

/**
 * Encrypted comments are opaque and kept as base64; plaintext ones are decoded.
 */
function renderComment(comment: Uint8Array | null, encrypted: boolean): string | null {
    if (comment === null) {
        return null;
    }
    return encrypted ? bytesToBase64(comment) : decodeComment(comment);
}

export function normalizeJettonTransfer(block: Block<'jetton_transfer'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: ctx.expectAddress(data.sender, 'source'),
        sourceSecondary: ctx.expectAddress(data.senderWallet, 'sourceSecondary'),
        destination: ctx.expectAddress(data.receiver, 'destination'),
        destinationSecondary: resolveAddress(data.receiverWallet),
        amount: amountToString(data.amount),
        asset: resolveAddress(data.asset),
        details: {
            kind: 'jetton_transfer',
            queryId: data.queryId.toString(),
            responseDestination: resolveAddress(data.responseAddress),
            forwardAmount: amountToString(data.forwardAmount),
            customPayload: data.customPayload,
            forwardPayload: data.forwardPayload,
            comment: renderComment(data.comment, data.encryptedComment),
            isEncryptedComment: data.encryptedComment
        }
    };
}

export function normalizeJettonBurn(block: Block<'jetton_burn'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: ctx.expectAddress(data.owner, 'source'),
        sourceSecondary: ctx.expectAddress(data.jettonWallet, 'sourceSecondary'),
        asset: resolveAddress(data.asset),
        amount: amountToString(data.amount)
    };
}

export function normalizeJettonMint(block: Block<'jetton_mint'>): ActionPatch {
    const { data } = block;
    return {
        destination: resolveAddress(data.to),
        destinationSecondary: resolveAddress(data.toJettonWallet),
        asset: resolveAddress(data.asset),
        amount: amountToString(data.amount),
        value: amountToString(data.tonAmount)
    };
}
