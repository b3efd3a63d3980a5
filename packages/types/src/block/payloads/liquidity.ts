import type { IAccountId, IAsset } from '../../ledger/index.js';

export interface IDexDepositLiquidityData {
    dex: string;
    sender: IAccountId | null;
    pool: IAccountId | null;
    amount1: bigint | null;
    amount2: bigint | null;
    asset1: IAsset | null;
    asset2: IAsset | null;
    senderWallet1: IAccountId | null;
    senderWallet2: IAccountId | null;
    lpTokensMinted: bigint | null;
}

/**
 * Completed two-sided DeDust deposit: both sides reached the deposit contract
 * and LP tokens were minted.
 */
export interface IDedustDepositLiquidityData {
    dex: string;
    sender: IAccountId | null;
    poolAddress: IAccountId | null;
    depositContract: IAccountId | null;
    asset1: IAsset;
    amount1: bigint;
    asset2: IAsset;
    amount2: bigint;
    userJettonWallet1: IAccountId | null;
    userJettonWallet2: IAccountId | null;
    lpTokensMinted: bigint;
}

/**
 * One side of a DeDust deposit that reached the deposit contract before the
 * pool minted anything.
 */
export interface IDedustDepositLiquidityPartialData {
    dex: string;
    sender: IAccountId | null;
    depositContract: IAccountId | null;
    asset1: IAsset;
    amount1: bigint;
    asset2: IAsset;
    amount2: bigint;
    userJettonWallet1: IAccountId | null;
    userJettonWallet2: IAccountId | null;
}

export interface IDexWithdrawLiquidityData {
    dex: string;
    sender: IAccountId | null;
    senderWallet: IAccountId | null;
    pool: IAccountId | null;
    /** LP token being burnt */
    asset: IAsset | null;
    amount1Out: bigint | null;
    amount2Out: bigint | null;
    asset1Out: IAsset | null;
    asset2Out: IAsset | null;
    wallet1: IAccountId | null;
    wallet2: IAccountId | null;
    dexJettonWallet1: IAccountId | null;
    dexWallet1: IAccountId | null;
    dexWallet2: IAccountId | null;
    dexJettonWallet2: IAccountId | null;
    isRefund: boolean;
    lpTokensBurnt: bigint | null;
}
