import type {
    IAuctionBidData,
    ICallContractData,
    IDedustDepositLiquidityData,
    IDedustDepositLiquidityPartialData,
    IDexDepositLiquidityData,
    IDexWithdrawLiquidityData,
    IDnsChangeRecordData,
    IDnsDeleteRecordData,
    IDnsRenewData,
    IElectionStakeData,
    IJVaultClaimData,
    IJVaultStakeData,
    IJVaultUnstakeData,
    IJettonBurnData,
    IJettonMintData,
    IJettonSwapData,
    IJettonTransferData,
    IMultisigApproveData,
    IMultisigCreateOrderData,
    INftDiscoveryData,
    INftMintData,
    INftTransferData,
    INominatorPoolDepositData,
    INominatorPoolWithdrawRequestData,
    ISubscribeData,
    ITonTransferData,
    ITonstakersDepositData,
    ITonstakersWithdrawData,
    ITonstakersWithdrawRequestData,
    IUnsubscribeData,
    IVestingAddWhitelistData,
    IVestingSendMessageData
} from './payloads/index.js';

/**
 * Payload carried by each block type.
 *
 * This map is the single source of truth for the closed set of operation types
 * the classifier emits. Adding a key here forces a matching normalizer entry at
 * compile time.
 */
export interface BlockDataMap {
    call_contract: ICallContractData;
    contract_deploy: ICallContractData;
    ton_transfer: ITonTransferData;
    jetton_transfer: IJettonTransferData;
    jetton_burn: IJettonBurnData;
    jetton_mint: IJettonMintData;
    jetton_swap: IJettonSwapData;
    nft_transfer: INftTransferData;
    nft_discovery: INftDiscoveryData;
    nft_mint: INftMintData;
    dex_deposit_liquidity: IDexDepositLiquidityData;
    dex_withdraw_liquidity: IDexWithdrawLiquidityData;
    dedust_deposit_liquidity: IDedustDepositLiquidityData;
    dedust_deposit_liquidity_partial: IDedustDepositLiquidityPartialData;
    nominator_pool_deposit: INominatorPoolDepositData;
    nominator_pool_withdraw_request: INominatorPoolWithdrawRequestData;
    tonstakers_deposit: ITonstakersDepositData;
    tonstakers_withdraw_request: ITonstakersWithdrawRequestData;
    tonstakers_withdraw: ITonstakersWithdrawData;
    jvault_stake: IJVaultStakeData;
    jvault_unstake: IJVaultUnstakeData;
    jvault_claim: IJVaultClaimData;
    change_dns: IDnsChangeRecordData;
    delete_dns: IDnsDeleteRecordData;
    renew_dns: IDnsRenewData;
    multisig_create_order: IMultisigCreateOrderData;
    multisig_approve: IMultisigApproveData;
    vesting_send_message: IVestingSendMessageData;
    vesting_add_whitelist: IVestingAddWhitelistData;
    subscribe: ISubscribeData;
    unsubscribe: IUnsubscribeData;
    election_deposit: IElectionStakeData;
    election_recover: IElectionStakeData;
    auction_bid: IAuctionBidData;
}

/**
 * Operation type tag of a classified block.
 */
export type BlockType = keyof BlockDataMap;

/**
 * Every known block type, in the order the classifier documents them.
 */
export const BLOCK_TYPES = [
    'call_contract',
    'contract_deploy',
    'ton_transfer',
    'jetton_transfer',
    'jetton_burn',
    'jetton_mint',
    'jetton_swap',
    'nft_transfer',
    'nft_discovery',
    'nft_mint',
    'dex_deposit_liquidity',
    'dex_withdraw_liquidity',
    'dedust_deposit_liquidity',
    'dedust_deposit_liquidity_partial',
    'nominator_pool_deposit',
    'nominator_pool_withdraw_request',
    'tonstakers_deposit',
    'tonstakers_withdraw_request',
    'tonstakers_withdraw',
    'jvault_stake',
    'jvault_unstake',
    'jvault_claim',
    'change_dns',
    'delete_dns',
    'renew_dns',
    'multisig_create_order',
    'multisig_approve',
    'vesting_send_message',
    'vesting_add_whitelist',
    'subscribe',
    'unsubscribe',
    'election_deposit',
    'election_recover',
    'auction_bid'
] as const satisfies readonly BlockType[];

/**
 * Narrow an arbitrary tag read off the wire to a known block type.
 */
export function isBlockType(value: string): value is BlockType {
    return BLOCK_TYPES.some(type => type === value);
}
