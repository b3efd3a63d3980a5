import type { IAccountId, IAsset } from '../../ledger/index.js';

/**
 * Jetton transfer between two owners, routed through their jetton wallets.
 */
export interface IJettonTransferData {
    sender: IAccountId | null;
    senderWallet: IAccountId | null;
    receiver: IAccountId | null;
    /** Null when the receiving wallet never processed the internal transfer */
    receiverWallet: IAccountId | null;
    amount: bigint;
    asset: IAsset | null;
    queryId: bigint;
    responseAddress: IAccountId | null;
    forwardAmount: bigint;
    /** Base64 BoC */
    customPayload: string | null;
    /** Base64 BoC */
    forwardPayload: string | null;
    /** Raw comment bytes extracted from the forward payload */
    comment: Uint8Array | null;
    encryptedComment: boolean;
}

export interface IJettonBurnData {
    owner: IAccountId | null;
    jettonWallet: IAccountId | null;
    asset: IAsset;
    amount: bigint;
}

export interface IJettonMintData {
    to: IAccountId;
    toJettonWallet: IAccountId | null;
    asset: IAsset;
    /** Minted jetton amount, null when the mint notification was not observed */
    amount: bigint | null;
    /** Native value forwarded with the mint, null when absent */
    tonAmount: bigint | null;
}
