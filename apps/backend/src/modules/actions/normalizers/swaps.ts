import type { Block, ISwapLegDetails, ISwapTransfer } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import type { ActionPatch } from './types.js';

function toLegDetails(leg: ISwapTransfer): ISwapLegDetails {
    return {
        amount: leg.amount.toString(),
        source: resolveAddress(leg.source),
        sourceJettonWallet: resolveAddress(leg.sourceJettonWallet),
        destination: resolveAddress(leg.destination),
        destinationJettonWallet: resolveAddress(leg.destinationJettonWallet),
        asset: resolveAddress(leg.asset)
    };
}

/**
 * Swap through a DEX, described by the transfer into the pool and the one out of it.
 *
 * STON.fi v2 routes through proxy wallets, so its legs carry the proxy assets;
 * the block reports the real ones separately.
 */
export function normalizeJettonSwap(block: Block<'jetton_swap'>): ActionPatch {
    const { data } = block;
    const incoming = toLegDetails(data.dexIncomingTransfer);
    const outgoing = toLegDetails(data.dexOutgoingTransfer);

    let asset = incoming.asset;
    let asset2 = outgoing.asset;
    if (data.dex === 'stonfi_v2') {
        asset = resolveAddress(data.sourceAsset);
        asset2 = resolveAddress(data.destinationAsset);
    }
    if (data.destinationAsset !== null) {
        asset2 = resolveAddress(data.destinationAsset);
    }

    const destinationSecondary =
        data.destinationWallet !== null ? resolveAddress(data.destinationWallet) : outgoing.destinationJettonWallet;

    return {
        source: incoming.source,
        sourceSecondary: incoming.sourceJettonWallet,
        destination: outgoing.destination,
        destinationSecondary,
        asset,
        asset2,
        details: {
            kind: 'jetton_swap',
            dex: data.dex,
            sender: resolveAddress(data.sender),
            dexIncomingTransfer: incoming,
            dexOutgoingTransfer: outgoing
        }
    };
}

