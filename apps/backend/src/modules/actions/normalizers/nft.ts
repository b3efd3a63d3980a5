import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch, INormalizerContext } from './types.js';

export function normalizeNftTransfer(block: Block<'nft_transfer'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.prevOwner),
        destination: ctx.expectAddress(data.newOwner, 'newOwner'),
        assetSecondary: resolveAddress(data.nft.address),
        asset: resolveAddress(data.nft.collection),
        details: {
            kind: 'nft_transfer',
            queryId: data.queryId.toString(),
            isPurchase: data.isPurchase,
            // a price on a plain transfer is whatever the classifier saw attached; only sales report it
            price: data.isPurchase ? amountToString(data.price) : null,
            nftItemIndex: amountToString(data.nft.index),
            forwardAmount: amountToString(data.forwardAmount),
            customPayload: data.customPayload,
            forwardPayload: data.forwardPayload,
            responseDestination: resolveAddress(data.responseDestination)
        }
    };
}

export function normalizeNftDiscovery(block: Block<'nft_discovery'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.sender),
        destination: resolveAddress(data.nft),
        details: {
            kind: 'nft_discovery',
            queryId: data.queryId.toString(),
            collectionAddress: data.resultCollection.toRawString(),
            nftItemIndex: data.resultIndex.toString()
        }
    };
}

export function normalizeNftMint(block: Block<'nft_mint'>): ActionPatch {
    const { data } = block;
    const item = resolveAddress(data.address);
    return {
        source: resolveAddress(data.source),
        destination: item,
        assetSecondary: item,
        asset: resolveAddress(data.collection),
        opcode: data.opcode,
        details: {
            kind: 'nft_mint',
            nftItemIndex: amountToString(data.index)
        }
    };
}
