import type { IAccountId } from '../../ledger/index.js';

export interface IMultisigCreateOrderData {
    createdBy: IAccountId | null;
    multisig: IAccountId | null;
    orderContractAddress: IAccountId | null;
    queryId: bigint;
    orderSeqno: bigint;
    isCreatedBySigner: boolean;
    creatorApproved: boolean;
    creatorIndex: number;
    /** Unix timestamp after which the order can no longer be executed */
    expirationDate: number;
    /** Base64 BoC of the order body */
    orderBoc: string;
}

export interface IMultisigApproveData {
    signer: IAccountId | null;
    order: IAccountId | null;
    signerIndex: number;
    exitCode: number;
    /** Whether the order contract accepted the approval */
    success: boolean;
}
