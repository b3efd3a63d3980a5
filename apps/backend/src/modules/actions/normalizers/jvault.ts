import type { Block, IJVaultStakeData } from '@actionindex/types';
import { resolveAddress } from '../address.js';
import { amountToString } from '../format.js';
import type { ActionPatch } from './types.js';

type JVaultParticipants = Pick<IJVaultStakeData, 'sender' | 'stakeWallet' | 'stakingPool'>;

function participants(data: JVaultParticipants): ActionPatch {
    return {
        source: resolveAddress(data.sender),
        sourceSecondary: resolveAddress(data.stakeWallet),
        destination: resolveAddress(data.stakingPool)
    };
}

export function normalizeJVaultStake(block: Block<'jvault_stake'>): ActionPatch {
    const { data } = block;
    return {
        ...participants(data),
        amount: amountToString(data.stakedAmount),
        details: {
            kind: 'jvault_stake',
            period: data.period,
            mintedStakeJettons: data.mintedStakeJettons.toString()
        }
    };
}

export function normalizeJVaultUnstake(block: Block<'jvault_unstake'>): ActionPatch {
    const { data } = block;
    return {
        ...participants(data),
        amount: amountToString(data.unstakedAmount)
    };
}

export function normalizeJVaultClaim(block: Block<'jvault_claim'>): ActionPatch {
    const { data } = block;
    return {
        ...participants(data),
        details: {
            kind: 'jvault_claim',
            claimedJettons: data.claimedJettons.map(jetton => jetton.toRawString()),
            claimedAmounts: data.claimedAmounts.map(amount => amount.toString())
        }
    };
}
