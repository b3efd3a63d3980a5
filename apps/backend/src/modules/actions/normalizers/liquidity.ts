import type { Block, IDedustDepositLiquidityPartialData, IDexDepositLiquidityDetails } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch } from './types.js';

export function normalizeDexDepositLiquidity(block: Block<'dex_deposit_liquidity'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.sender),
        destination: resolveAddress(data.pool),
        details: {
            kind: 'dex_deposit_liquidity',
            dex: data.dex,
            amount1: amountToString(data.amount1),
            amount2: amountToString(data.amount2),
            asset1: resolveAddress(data.asset1),
            asset2: resolveAddress(data.asset2),
            userJettonWallet1: resolveAddress(data.senderWallet1),
            userJettonWallet2: resolveAddress(data.senderWallet2),
            lpTokensMinted: amountToString(data.lpTokensMinted)
        }
    };
}

function dedustDepositDetails(
    data: IDedustDepositLiquidityPartialData,
    lpTokensMinted: bigint | null
): IDexDepositLiquidityDetails {
    return {
        kind: 'dex_deposit_liquidity',
        dex: data.dex,
        asset1: resolveAddress(data.asset1),
        amount1: amountToString(data.amount1),
        asset2: resolveAddress(data.asset2),
        amount2: amountToString(data.amount2),
        userJettonWallet1: resolveAddress(data.userJettonWallet1),
        userJettonWallet2: resolveAddress(data.userJettonWallet2),
        lpTokensMinted: amountToString(lpTokensMinted)
    };
}

/**
 * DeDust deposits go through a per-user deposit contract and are reported as
 * regular liquidity deposits.
 */
export function normalizeDedustDepositLiquidity(block: Block<'dedust_deposit_liquidity'>): ActionPatch {
    const { data } = block;
    return {
        type: 'dex_deposit_liquidity',
        source: resolveAddress(data.sender),
        destination: resolveAddress(data.poolAddress),
        destinationSecondary: resolveAddress(data.depositContract),
        details: dedustDepositDetails(data, data.lpTokensMinted)
    };
}

/**
 * Only one side has reached the deposit contract; no pool is involved yet.
 */
export function normalizeDedustDepositLiquidityPartial(block: Block<'dedust_deposit_liquidity_partial'>): ActionPatch {
    const { data } = block;
    return {
        type: 'dex_deposit_liquidity',
        source: resolveAddress(data.sender),
        destinationSecondary: resolveAddress(data.depositContract),
        details: dedustDepositDetails(data, null)
    };
}

export function normalizeDexWithdrawLiquidity(block: Block<'dex_withdraw_liquidity'>): ActionPatch {
    const { data } = block;
    return {
        source: resolveAddress(data.sender),
        sourceSecondary: resolveAddress(data.senderWallet),
        destination: resolveAddress(data.pool),
        asset: resolveAddress(data.asset),
        details: {
            kind: 'dex_withdraw_liquidity',
            dex: data.dex,
            amount1: amountToString(data.amount1Out),
            amount2: amountToString(data.amount2Out),
            assetOut1: resolveAddress(data.asset1Out),
            assetOut2: resolveAddress(data.asset2Out),
            userJettonWallet1: resolveAddress(data.wallet1),
            userJettonWallet2: resolveAddress(data.wallet2),
            dexJettonWallet1: resolveAddress(data.dexJettonWallet1),
            dexWallet1: resolveAddress(data.dexWallet1),
            dexWallet2: resolveAddress(data.dexWallet2),
            dexJettonWallet2: resolveAddress(data.dexJettonWallet2),
            isRefund: data.isRefund,
            lpTokensBurnt: amountToString(data.lpTokensBurnt)
        }
    };
}
