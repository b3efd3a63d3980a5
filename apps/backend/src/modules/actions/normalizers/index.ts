import { normalizeContractCall, normalizeTonTransfer } from './basic.js';
import { normalizeChangeDns, normalizeDeleteDns, normalizeRenewDns } from './dns.js';
import { normalizeJettonBurn, normalizeJettonMint, normalizeJettonTransfer } from './jettons.js';
import { normalizeJVaultClaim, normalizeJVaultStake, normalizeJVaultUnstake } from './jvault.js';
import {
    normalizeDedustDepositLiquidity,
    normalizeDedustDepositLiquidityPartial,
    normalizeDexDepositLiquidity,
    normalizeDexWithdrawLiquidity
} from './liquidity.js';
import { normalizeAuctionBid, normalizeElectionStake } from './misc.js';
import { normalizeMultisigApprove, normalizeMultisigCreateOrder } from './multisig.js';
import { normalizeNftDiscovery, normalizeNftMint, normalizeNftTransfer } from './nft.js';
import {
    normalizeNominatorPoolDeposit,
    normalizeNominatorPoolWithdrawRequest,
    normalizeTonstakersDeposit,
    normalizeTonstakersWithdraw,
    normalizeTonstakersWithdrawRequest
} from './staking.js';
import { normalizeSubscribe, normalizeUnsubscribe } from './subscriptions.js';
import { normalizeJettonSwap } from './swaps.js';
import type { NormalizerTable } from './types.js';
import { normalizeVestingAddWhitelist, normalizeVestingSendMessage } from './vesting.js';

export const NORMALIZERS: NormalizerTable = {
    call_contract: normalizeContractCall,
    contract_deploy: normalizeContractCall,
    ton_transfer: normalizeTonTransfer,
    jetton_transfer: normalizeJettonTransfer,
    jetton_burn: normalizeJettonBurn,
    jetton_mint: normalizeJettonMint,
    jetton_swap: normalizeJettonSwap,
    nft_transfer: normalizeNftTransfer,
    nft_discovery: normalizeNftDiscovery,
    nft_mint: normalizeNftMint,
    dex_deposit_liquidity: normalizeDexDepositLiquidity,
    dex_withdraw_liquidity: normalizeDexWithdrawLiquidity,
    dedust_deposit_liquidity: normalizeDedustDepositLiquidity,
    dedust_deposit_liquidity_partial: normalizeDedustDepositLiquidityPartial,
    nominator_pool_deposit: normalizeNominatorPoolDeposit,
    nominator_pool_withdraw_request: normalizeNominatorPoolWithdrawRequest,
    tonstakers_deposit: normalizeTonstakersDeposit,
    tonstakers_withdraw_request: normalizeTonstakersWithdrawRequest,
    tonstakers_withdraw: normalizeTonstakersWithdraw,
    jvault_stake: normalizeJVaultStake,
    jvault_unstake: normalizeJVaultUnstake,
    jvault_claim: normalizeJVaultClaim,
    change_dns: normalizeChangeDns,
    delete_dns: normalizeDeleteDns,
    renew_dns: normalizeRenewDns,
    multisig_create_order: normalizeMultisigCreateOrder,
    multisig_approve: normalizeMultisigApprove,
    vesting_send_message: normalizeVestingSendMessage,
    vesting_add_whitelist: normalizeVestingAddWhitelist,
    subscribe: normalizeSubscribe,
    unsubscribe: normalizeUnsubscribe,
    election_deposit: normalizeElectionStake,
    election_recover: normalizeElectionStake,
    auction_bid: normalizeAuctionBid
};

export { createNormalizerContext } from './types.js';
export type { ActionPatch, INormalizerContext, Normalizer, NormalizerTable } from './types.js';
