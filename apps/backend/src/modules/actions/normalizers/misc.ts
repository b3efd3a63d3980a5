import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch } from './types.js';

/**
 * Validator stake sent to, or returned from, the elector.
 */
export function normalizeElectionStake(block: Block<'election_deposit' | 'election_recover'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.stakeHolder),
        amount: amountToString(data.amount)
    };
}

/**
 * Bids are reported with the item under auction; only its index is known at bid time.
 */
export function normalizeAuctionBid(block: Block<'auction_bid'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.bidder),
        destination: resolveAddress(data.auction),
        assetSecondary: resolveAddress(data.nftAddress),
        asset: resolveAddress(data.nftCollection),
        value: amountToString(data.amount),
        details: {
            kind: 'nft_transfer',
            queryId: null,
            isPurchase: null,
            price: null,
            nftItemIndex: amountToString(data.nftItemIndex),
            forwardAmount: null,
            customPayload: null,
            forwardPayload: null,
            responseDestination: null
        }
    };
}
