import type { IAccountId } from '../../ledger/index.js';

/**
 * Validator stake sent to, or recovered from, the elector contract.
 */
export interface IElectionStakeData {
    stakeHolder: IAccountId;
    /** Null for a recover request the elector answered without a refund */
    amount: bigint | null;
}

export interface IAuctionBidData {
    bidder: IAccountId;
    auction: IAccountId;
    nftAddress: IAccountId;
    nftCollection: IAccountId | null;
    nftItemIndex: bigint | null;
    amount: bigint;
}
