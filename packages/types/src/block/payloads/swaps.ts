import type { IAccountId, IAsset } from '../../ledger/index.js';

/**
 * One leg of a DEX swap: the transfer into the pool or out of it.
 */
export interface ISwapTransfer {
    amount: bigint;
    source: IAccountId | null;
    sourceJettonWallet: IAccountId | null;
    destination: IAccountId | null;
    destinationJettonWallet: IAccountId | null;
    asset: IAsset | null;
}

export interface IJettonSwapData {
    /** DEX implementation, e.g. `stonfi`, `stonfi_v2`, `dedust` */
    dex: string;
    sender: IAccountId | null;
    dexIncomingTransfer: ISwapTransfer;
    dexOutgoingTransfer: ISwapTransfer;
    /** Explicit offered asset reported by DEX versions that expose it */
    sourceAsset: IAsset | null;
    /** Explicit asked asset reported by DEX versions that expose it */
    destinationAsset: IAsset | null;
    /** Wallet that finally received the asked asset, when it differs from the leg's */
    destinationWallet: IAccountId | null;
}
