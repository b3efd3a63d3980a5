import type { DnsValueSchema } from '../block/index.js';

/**
 * Type-specific payloads of an action.
 *
 * Every member carries a `kind` discriminant, and an action holds at most one
 * of them. Amounts, query ids and item indexes are base-10 strings because they
 * routinely exceed 64 bits.
 */

export interface ITonTransferDetails {
    kind: 'ton_transfer';
    content: string | null;
    encrypted: boolean;
}

export interface IJettonTransferDetails {
    kind: 'jetton_transfer';
    queryId: string;
    responseDestination: string | null;
    forwardAmount: string | null;
    customPayload: string | null;
    forwardPayload: string | null;
    comment: string | null;
    isEncryptedComment: boolean;
}

export interface INftTransferDetails {
    kind: 'nft_transfer';
    queryId: string | null;
    isPurchase: boolean | null;
    price: string | null;
    nftItemIndex: string | null;
    forwardAmount: string | null;
    customPayload: string | null;
    forwardPayload: string | null;
    responseDestination: string | null;
}

export interface INftDiscoveryDetails {
    kind: 'nft_discovery';
    queryId: string;
    collectionAddress: string;
    nftItemIndex: string;
}

export interface INftMintDetails {
    kind: 'nft_mint';
    nftItemIndex: string | null;
}

export interface ISwapLegDetails {
    amount: string;
    source: string | null;
    sourceJettonWallet: string | null;
    destination: string | null;
    destinationJettonWallet: string | null;
    asset: string | null;
}

export interface IJettonSwapDetails {
    kind: 'jetton_swap';
    dex: string;
    sender: string | null;
    dexIncomingTransfer: ISwapLegDetails;
    dexOutgoingTransfer: ISwapLegDetails;
}

export interface IDexDepositLiquidityDetails {
    kind: 'dex_deposit_liquidity';
    dex: string;
    amount1: string | null;
    amount2: string | null;
    asset1: string | null;
    asset2: string | null;
    userJettonWallet1: string | null;
    userJettonWallet2: string | null;
    lpTokensMinted: string | null;
}

export interface IDexWithdrawLiquidityDetails {
    kind: 'dex_withdraw_liquidity';
    dex: string;
    amount1: string | null;
    amount2: string | null;
    assetOut1: string | null;
    assetOut2: string | null;
    userJettonWallet1: string | null;
    userJettonWallet2: string | null;
    dexJettonWallet1: string | null;
    dexWallet1: string | null;
    dexWallet2: string | null;
    dexJettonWallet2: string | null;
    isRefund: boolean;
    lpTokensBurnt: string | null;
}

export interface IJVaultStakeDetails {
    kind: 'jvault_stake';
    period: number;
    mintedStakeJettons: string;
}

export interface IJVaultClaimDetails {
    kind: 'jvault_claim';
    claimedJettons: string[];
    claimedAmounts: string[];
}

export interface IChangeDnsRecordDetails {
    kind: 'change_dns_record';
    /** Null for a deleted record */
    valueSchema: DnsValueSchema | null;
    flags: number | null;
    address: string | null;
    /** Hex-encoded record key */
    key: string;
    dnsText: string | null;
}

export type StakingProvider = 'nominator' | 'tonstakers';

export interface IStakingDetails {
    kind: 'staking';
    provider: StakingProvider;
    /** Tonstakers withdrawal receipt NFT, when one was minted or burnt */
    tsNft: string | null;
}

export interface IMultisigCreateOrderDetails {
    kind: 'multisig_create_order';
    queryId: string;
    orderSeqno: string;
    isCreatedBySigner: boolean;
    isSignedByCreator: boolean;
    creatorIndex: number;
    expirationDate: number;
    orderBoc: string;
}

export interface IMultisigApproveDetails {
    kind: 'multisig_approve';
    signerIndex: number;
    exitCode: number;
}

export interface IVestingSendMessageDetails {
    kind: 'vesting_send_message';
    queryId: string;
    messageBoc: string;
}

export interface IVestingAddWhitelistDetails {
    kind: 'vesting_add_whitelist';
    queryId: string;
    accountsAdded: string[];
}

export type ActionDetails =
    | ITonTransferDetails
    | IJettonTransferDetails
    | INftTransferDetails
    | INftDiscoveryDetails
    | INftMintDetails
    | IJettonSwapDetails
    | IDexDepositLiquidityDetails
    | IDexWithdrawLiquidityDetails
    | IJVaultStakeDetails
    | IJVaultClaimDetails
    | IChangeDnsRecordDetails
    | IStakingDetails
    | IMultisigCreateOrderDetails
    | IMultisigApproveDetails
    | IVestingSendMessageDetails
    | IVestingAddWhitelistDetails;

export type ActionDetailsKind = ActionDetails['kind'];
