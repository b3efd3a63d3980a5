import type { IAccountId } from '../../ledger/index.js';

/**
 * NFT item as referenced by transfer payloads.
 */
export interface INftItemRef {
    address: IAccountId;
    index: bigint | null;
    collection: IAccountId | null;
}

export interface INftTransferData {
    /** Null for transfers out of a sale contract whose owner is unknown */
    prevOwner: IAccountId | null;
    newOwner: IAccountId | null;
    nft: INftItemRef;
    queryId: bigint;
    isPurchase: boolean;
    /** Sale price, only meaningful when `isPurchase` is set */
    price: bigint | null;
    forwardAmount: bigint | null;
    customPayload: string | null;
    forwardPayload: string | null;
    responseDestination: IAccountId | null;
}

/**
 * Answer of an NFT item to a `get_static_data` discovery request.
 */
export interface INftDiscoveryData {
    sender: IAccountId;
    nft: IAccountId;
    queryId: bigint;
    resultCollection: IAccountId;
    resultIndex: bigint;
}

export interface INftMintData {
    source: IAccountId | null;
    address: IAccountId;
    collection: IAccountId | null;
    index: bigint | null;
    opcode: number | null;
}
