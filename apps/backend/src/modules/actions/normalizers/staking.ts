import type { Block } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch, INormalizerContext } from './types.js';

export function normalizeNominatorPoolDeposit(block: Block<'nominator_pool_deposit'>): ActionPatch {
    const { data } = block;
    return {
        type: 'stake_deposit',
        source: resolveAddress(data.source),
        destination: resolveAddress(data.pool),
        amount: amountToString(data.value),
        details: { kind: 'staking', provider: 'nominator', tsNft: null }
    };
}

/**
 * A request that already carries a payout completed within the same trace and
 * is reported as the withdrawal itself.
 */
export function normalizeNominatorPoolWithdrawRequest(block: Block<'nominator_pool_withdraw_request'>): ActionPatch {
    const { data } = block;
    const staking = { kind: 'staking', provider: 'nominator', tsNft: null } as const;
    const participants = {
        source: resolveAddress(data.source),
        destination: resolveAddress(data.pool)
    };

    if (data.payoutAmount === null) {
        return { type: 'stake_withdrawal_request', ...participants, details: staking };
    }
    return {
        type: 'stake_withdrawal',
        ...participants,
        amount: amountToString(data.payoutAmount),
        details: staking
    };
}

export function normalizeTonstakersDeposit(block: Block<'tonstakers_deposit'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        type: 'stake_deposit',
        source: resolveAddress(data.source),
        destination: ctx.expectAddress(data.pool, 'pool'),
        amount: amountToString(data.value),
        details: { kind: 'staking', provider: 'tonstakers', tsNft: null }
    };
}

export function normalizeTonstakersWithdrawRequest(
    block: Block<'tonstakers_withdraw_request'>,
    ctx: INormalizerContext
): ActionPatch {
    const { data } = block;
    return {
        type: 'stake_withdrawal_request',
        source: resolveAddress(data.source),
        sourceSecondary: resolveAddress(data.tsTonWallet),
        destination: ctx.expectAddress(data.pool, 'pool'),
        amount: amountToString(data.tokensBurnt),
        details: { kind: 'staking', provider: 'tonstakers', tsNft: resolveAddress(data.mintedNft) }
    };
}

export function normalizeTonstakersWithdraw(block: Block<'tonstakers_withdraw'>, ctx: INormalizerContext): ActionPatch {
    const { data } = block;
    return {
        type: 'stake_withdrawal',
        source: resolveAddress(data.stakeHolder),
        destination: ctx.expectAddress(data.pool, 'pool'),
        amount: amountToString(data.amount),
        details: { kind: 'staking', provider: 'tonstakers', tsNft: resolveAddress(data.burntNft) }
    };
}
