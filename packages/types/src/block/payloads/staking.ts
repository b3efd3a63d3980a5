import type { IAccountId } from '../../ledger/index.js';

export interface INominatorPoolDepositData {
    source: IAccountId;
    pool: IAccountId;
    value: bigint;
}

/**
 * Withdrawal from a nominator pool. The pool pays out immediately when it has
 * liquidity; otherwise the request is queued and no payout is observed.
 */
export interface INominatorPoolWithdrawRequestData {
    source: IAccountId;
    pool: IAccountId;
    payoutAmount: bigint | null;
}

export interface ITonstakersDepositData {
    source: IAccountId | null;
    pool: IAccountId | null;
    value: bigint;
}

export interface ITonstakersWithdrawRequestData {
    source: IAccountId | null;
    tsTonWallet: IAccountId | null;
    pool: IAccountId | null;
    tokensBurnt: bigint;
    /** Withdrawal receipt NFT minted when the payout is deferred */
    mintedNft: IAccountId | null;
}

export interface ITonstakersWithdrawData {
    stakeHolder: IAccountId | null;
    pool: IAccountId | null;
    amount: bigint;
    /** Receipt NFT burnt on payout */
    burntNft: IAccountId | null;
}

export interface IJVaultStakeData {
    sender: IAccountId | null;
    stakeWallet: IAccountId | null;
    stakingPool: IAccountId | null;
    stakedAmount: bigint;
    /** Lock period in seconds */
    period: number;
    mintedStakeJettons: bigint;
}

export interface IJVaultUnstakeData {
    sender: IAccountId | null;
    stakeWallet: IAccountId | null;
    stakingPool: IAccountId | null;
    unstakedAmount: bigint;
}

export interface IJVaultClaimData {
    sender: IAccountId | null;
    stakeWallet: IAccountId | null;
    stakingPool: IAccountId | null;
    claimedJettons: IAccountId[];
    claimedAmounts: bigint[];
}
