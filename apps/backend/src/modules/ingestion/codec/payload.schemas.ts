/**
 * Zod schemas for block payloads, one per block type.
 *
 * Wire names are snake_case as emitted by the classifier. Nullable references
 * may also be omitted; both decode to `null`.
 */
import { z } from 'zod';
import type {
  BlockDataMap,
  BlockType,
  DnsRecordValue,
  ICallContractData,
  IDnsChangeRecordData,
  IElectionStakeData,
  ISwapTransfer
} from '@actionindex/types';
import { AccountIdSchema, AssetSchema, BigIntSchema, BytesSchema } from './primitives.js';

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const optionalAccount = AccountIdSchema.nullish().transform(value => value ?? null);
const optionalAsset = AssetSchema.nullish().transform(value => value ?? null);
const optionalAmount = BigIntSchema.nullish().transform(value => value ?? null);
const optionalText = z.string().nullish().transform(value => value ?? null);
const optionalBytes = BytesSchema.nullish().transform(value => value ?? null);
const smallInt = z.number().int();

const CallContractSchema: PayloadSchema<ICallContractData> = z
  .object({
    opcode: smallInt.nullish().transform(value => value ?? null),
    source: optionalAccount,
    destination: optionalAccount,
    value: BigIntSchema
  });

const TonTransferSchema: PayloadSchema<BlockDataMap['ton_transfer']> = z.object({
  source: optionalAccount,
  destination: optionalAccount,
  value: BigIntSchema,
  comment: optionalText,
  encrypted: z.boolean().default(false)
});

const JettonTransferSchema: PayloadSchema<BlockDataMap['jetton_transfer']> = z
  .object({
    sender: optionalAccount,
    sender_wallet: optionalAccount,
    receiver: optionalAccount,
    receiver_wallet: optionalAccount,
    amount: BigIntSchema,
    asset: optionalAsset,
    query_id: BigIntSchema,
    response_address: optionalAccount,
    forward_amount: BigIntSchema,
    custom_payload: optionalText,
    forward_payload: optionalText,
    comment: optionalBytes,
    encrypted_comment: z.boolean().default(false)
  })
  .transform(data => ({
    sender: data.sender,
    senderWallet: data.sender_wallet,
    receiver: data.receiver,
    receiverWallet: data.receiver_wallet,
    amount: data.amount,
    asset: data.asset,
    queryId: data.query_id,
    responseAddress: data.response_address,
    forwardAmount: data.forward_amount,
    customPayload: data.custom_payload,
    forwardPayload: data.forward_payload,
    comment: data.comment,
    encryptedComment: data.encrypted_comment
  }));

const JettonBurnSchema: PayloadSchema<BlockDataMap['jetton_burn']> = z
  .object({
    owner: optionalAccount,
    jetton_wallet: optionalAccount,
    asset: AssetSchema,
    amount: BigIntSchema
  })
  .transform(data => ({ owner: data.owner, jettonWallet: data.jetton_wallet, asset: data.asset, amount: data.amount }));

const JettonMintSchema: PayloadSchema<BlockDataMap['jetton_mint']> = z
  .object({
    to: AccountIdSchema,
    to_jetton_wallet: optionalAccount,
    asset: AssetSchema,
    amount: optionalAmount,
    ton_amount: optionalAmount
  })
  .transform(data => ({
    to: data.to,
    toJettonWallet: data.to_jetton_wallet,
    asset: data.asset,
    amount: data.amount,
    tonAmount: data.ton_amount
  }));

const SwapTransferSchema: PayloadSchema<ISwapTransfer> = z
  .object({
    amount: BigIntSchema,
    source: optionalAccount,
    source_jetton_wallet: optionalAccount,
    destination: optionalAccount,
    destination_jetton_wallet: optionalAccount,
    asset: optionalAsset
  })
  .transform(data => ({
    amount: data.amount,
    source: data.source,
    sourceJettonWallet: data.source_jetton_wallet,
    destination: data.destination,
    destinationJettonWallet: data.destination_jetton_wallet,
    asset: data.asset
  }));

const JettonSwapSchema: PayloadSchema<BlockDataMap['jetton_swap']> = z
  .object({
    dex: z.string().min(1),
    sender: optionalAccount,
    dex_incoming_transfer: SwapTransferSchema,
    dex_outgoing_transfer: SwapTransferSchema,
    source_asset: optionalAsset,
    destination_asset: optionalAsset,
    destination_wallet: optionalAccount
  })
  .transform(data => ({
    dex: data.dex,
    sender: data.sender,
    dexIncomingTransfer: data.dex_incoming_transfer,
    dexOutgoingTransfer: data.dex_outgoing_transfer,
    sourceAsset: data.source_asset,
    destinationAsset: data.destination_asset,
    destinationWallet: data.destination_wallet
  }));

const NftTransferSchema: PayloadSchema<BlockDataMap['nft_transfer']> = z
  .object({
    prev_owner: optionalAccount,
    new_owner: optionalAccount,
    nft: z.object({
      address: AccountIdSchema,
      index: optionalAmount,
      collection: z.object({ address: AccountIdSchema }).nullish()
    }),
    query_id: BigIntSchema,
    is_purchase: z.boolean().default(false),
    price: optionalAmount,
    forward_amount: optionalAmount,
    custom_payload: optionalText,
    forward_payload: optionalText,
    response_destination: optionalAccount
  })
  .transform(data => ({
    prevOwner: data.prev_owner,
    newOwner: data.new_owner,
    nft: {
      address: data.nft.address,
      index: data.nft.index,
      collection: data.nft.collection?.address ?? null
    },
    queryId: data.query_id,
    isPurchase: data.is_purchase,
    price: data.price,
    forwardAmount: data.forward_amount,
    customPayload: data.custom_payload,
    forwardPayload: data.forward_payload,
    responseDestination: data.response_destination
  }));

const NftDiscoverySchema: PayloadSchema<BlockDataMap['nft_discovery']> = z
  .object({
    sender: AccountIdSchema,
    nft: AccountIdSchema,
    query_id: BigIntSchema,
    result_collection: AccountIdSchema,
    result_index: BigIntSchema
  })
  .transform(data => ({
    sender: data.sender,
    nft: data.nft,
    queryId: data.query_id,
    resultCollection: data.result_collection,
    resultIndex: data.result_index
  }));

const NftMintSchema: PayloadSchema<BlockDataMap['nft_mint']> = z.object({
  source: optionalAccount,
  address: AccountIdSchema,
  collection: optionalAccount,
  index: optionalAmount,
  opcode: smallInt.nullish().transform(value => value ?? null)
});

const DexDepositLiquiditySchema: PayloadSchema<BlockDataMap['dex_deposit_liquidity']> = z
  .object({
    dex: z.string().min(1),
    sender: optionalAccount,
    pool: optionalAccount,
    amount_1: optionalAmount,
    amount_2: optionalAmount,
    asset_1: optionalAsset,
    asset_2: optionalAsset,
    sender_wallet_1: optionalAccount,
    sender_wallet_2: optionalAccount,
    lp_tokens_minted: optionalAmount
  })
  .transform(data => ({
    dex: data.dex,
    sender: data.sender,
    pool: data.pool,
    amount1: data.amount_1,
    amount2: data.amount_2,
    asset1: data.asset_1,
    asset2: data.asset_2,
    senderWallet1: data.sender_wallet_1,
    senderWallet2: data.sender_wallet_2,
    lpTokensMinted: data.lp_tokens_minted
  }));

const DedustDepositFields = {
  dex: z.string().min(1),
  sender: optionalAccount,
  deposit_contract: optionalAccount,
  asset_1: AssetSchema,
  amount_1: BigIntSchema,
  asset_2: AssetSchema,
  amount_2: BigIntSchema,
  user_jetton_wallet_1: optionalAccount,
  user_jetton_wallet_2: optionalAccount
};

const DedustDepositLiquidityPartialSchema: PayloadSchema<BlockDataMap['dedust_deposit_liquidity_partial']> = z
  .object(DedustDepositFields)
  .transform(data => ({
    dex: data.dex,
    sender: data.sender,
    depositContract: data.deposit_contract,
    asset1: data.asset_1,
    amount1: data.amount_1,
    asset2: data.asset_2,
    amount2: data.amount_2,
    userJettonWallet1: data.user_jetton_wallet_1,
    userJettonWallet2: data.user_jetton_wallet_2
  }));

const DedustDepositLiquiditySchema: PayloadSchema<BlockDataMap['dedust_deposit_liquidity']> = z
  .object({
    ...DedustDepositFields,
    pool_address: optionalAccount,
    lp_tokens_minted: BigIntSchema
  })
  .transform(data => ({
    dex: data.dex,
    sender: data.sender,
    poolAddress: data.pool_address,
    depositContract: data.deposit_contract,
    asset1: data.asset_1,
    amount1: data.amount_1,
    asset2: data.asset_2,
    amount2: data.amount_2,
    userJettonWallet1: data.user_jetton_wallet_1,
    userJettonWallet2: data.user_jetton_wallet_2,
    lpTokensMinted: data.lp_tokens_minted
  }));

const DexWithdrawLiquiditySchema: PayloadSchema<BlockDataMap['dex_withdraw_liquidity']> = z
  .object({
    dex: z.string().min(1),
    sender: optionalAccount,
    sender_wallet: optionalAccount,
    pool: optionalAccount,
    asset: optionalAsset,
    amount1_out: optionalAmount,
    amount2_out: optionalAmount,
    asset1_out: optionalAsset,
    asset2_out: optionalAsset,
    wallet1: optionalAccount,
    wallet2: optionalAccount,
    dex_jetton_wallet_1: optionalAccount,
    dex_wallet_1: optionalAccount,
    dex_wallet_2: optionalAccount,
    dex_jetton_wallet_2: optionalAccount,
    is_refund: z.boolean().default(false),
    lp_tokens_burnt: optionalAmount
  })
  .transform(data => ({
    dex: data.dex,
    sender: data.sender,
    senderWallet: data.sender_wallet,
    pool: data.pool,
    asset: data.asset,
    amount1Out: data.amount1_out,
    amount2Out: data.amount2_out,
    asset1Out: data.asset1_out,
    asset2Out: data.asset2_out,
    wallet1: data.wallet1,
    wallet2: data.wallet2,
    dexJettonWallet1: data.dex_jetton_wallet_1,
    dexWallet1: data.dex_wallet_1,
    dexWallet2: data.dex_wallet_2,
    dexJettonWallet2: data.dex_jetton_wallet_2,
    isRefund: data.is_refund,
    lpTokensBurnt: data.lp_tokens_burnt
  }));

const NominatorPoolDepositSchema: PayloadSchema<BlockDataMap['nominator_pool_deposit']> = z.object({
  source: AccountIdSchema,
  pool: AccountIdSchema,
  value: BigIntSchema
});

const NominatorPoolWithdrawRequestSchema: PayloadSchema<BlockDataMap['nominator_pool_withdraw_request']> = z
  .object({
    source: AccountIdSchema,
    pool: AccountIdSchema,
    payout_amount: optionalAmount
  })
  .transform(data => ({ source: data.source, pool: data.pool, payoutAmount: data.payout_amount }));

const TonstakersDepositSchema: PayloadSchema<BlockDataMap['tonstakers_deposit']> = z.object({
  source: optionalAccount,
  pool: optionalAccount,
  value: BigIntSchema
});

const TonstakersWithdrawRequestSchema: PayloadSchema<BlockDataMap['tonstakers_withdraw_request']> = z
  .object({
    source: optionalAccount,
    ts_ton_wallet: optionalAccount,
    pool: optionalAccount,
    tokens_burnt: BigIntSchema,
    minted_nft: optionalAccount
  })
  .transform(data => ({
    source: data.source,
    tsTonWallet: data.ts_ton_wallet,
    pool: data.pool,
    tokensBurnt: data.tokens_burnt,
    mintedNft: data.minted_nft
  }));

const TonstakersWithdrawSchema: PayloadSchema<BlockDataMap['tonstakers_withdraw']> = z
  .object({
    stake_holder: optionalAccount,
    pool: optionalAccount,
    amount: BigIntSchema,
    burnt_nft: optionalAccount
  })
  .transform(data => ({ stakeHolder: data.stake_holder, pool: data.pool, amount: data.amount, burntNft: data.burnt_nft }));

const JVaultFields = {
  sender: optionalAccount,
  stake_wallet: optionalAccount,
  staking_pool: optionalAccount
};

const JVaultStakeSchema: PayloadSchema<BlockDataMap['jvault_stake']> = z
  .object({
    ...JVaultFields,
    staked_amount: BigIntSchema,
    period: smallInt,
    minted_stake_jettons: BigIntSchema
  })
  .transform(data => ({
    sender: data.sender,
    stakeWallet: data.stake_wallet,
    stakingPool: data.staking_pool,
    stakedAmount: data.staked_amount,
    period: data.period,
    mintedStakeJettons: data.minted_stake_jettons
  }));

const JVaultUnstakeSchema: PayloadSchema<BlockDataMap['jvault_unstake']> = z
  .object({ ...JVaultFields, unstaked_amount: BigIntSchema })
  .transform(data => ({
    sender: data.sender,
    stakeWallet: data.stake_wallet,
    stakingPool: data.staking_pool,
    unstakedAmount: data.unstaked_amount
  }));

const JVaultClaimSchema: PayloadSchema<BlockDataMap['jvault_claim']> = z
  .object({
    ...JVaultFields,
    claimed_jettons: z.array(AccountIdSchema),
    claimed_amounts: z.array(BigIntSchema)
  })
  .refine(data => data.claimed_jettons.length === data.claimed_amounts.length, {
    message: 'claimed_jettons and claimed_amounts must have the same length'
  })
  .transform(data => ({
    sender: data.sender,
    stakeWallet: data.stake_wallet,
    stakingPool: data.staking_pool,
    claimedJettons: data.claimed_jettons,
    claimedAmounts: data.claimed_amounts
  }));

const DnsRecordValueSchema: PayloadSchema<DnsRecordValue> = z
  .discriminatedUnion('schema', [
    z.object({ schema: z.literal('DNSNextResolver'), address: AccountIdSchema }),
    z.object({ schema: z.literal('DNSSmcAddress'), address: AccountIdSchema, flags: smallInt }),
    z.object({ schema: z.literal('DNSAdnlAddress'), address: BytesSchema, flags: smallInt }),
    z.object({ schema: z.literal('DNSText'), dns_text: z.string() })
  ])
  .transform((value): DnsRecordValue =>
    value.schema === 'DNSText' ? { schema: 'DNSText', dnsText: value.dns_text } : value
  );

const ChangeDnsSchema: PayloadSchema<IDnsChangeRecordData> = z.object({
  source: optionalAccount,
  destination: AccountIdSchema,
  key: BytesSchema,
  value: DnsRecordValueSchema
});

const DeleteDnsSchema: PayloadSchema<BlockDataMap['delete_dns']> = z.object({
  source: optionalAccount,
  destination: AccountIdSchema,
  key: BytesSchema
});

const RenewDnsSchema: PayloadSchema<BlockDataMap['renew_dns']> = z.object({
  source: optionalAccount,
  destination: optionalAccount
});

const MultisigCreateOrderSchema: PayloadSchema<BlockDataMap['multisig_create_order']> = z
  .object({
    created_by: optionalAccount,
    multisig: optionalAccount,
    order_contract_address: optionalAccount,
    query_id: BigIntSchema,
    order_seqno: BigIntSchema,
    is_created_by_signer: z.boolean(),
    creator_approved: z.boolean(),
    creator_index: smallInt,
    expiration_date: smallInt,
    order_boc: z.string()
  })
  .transform(data => ({
    createdBy: data.created_by,
    multisig: data.multisig,
    orderContractAddress: data.order_contract_address,
    queryId: data.query_id,
    orderSeqno: data.order_seqno,
    isCreatedBySigner: data.is_created_by_signer,
    creatorApproved: data.creator_approved,
    creatorIndex: data.creator_index,
    expirationDate: data.expiration_date,
    orderBoc: data.order_boc
  }));

const MultisigApproveSchema: PayloadSchema<BlockDataMap['multisig_approve']> = z
  .object({
    signer: optionalAccount,
    order: optionalAccount,
    signer_index: smallInt,
    exit_code: smallInt,
    success: z.boolean()
  })
  .transform(data => ({
    signer: data.signer,
    order: data.order,
    signerIndex: data.signer_index,
    exitCode: data.exit_code,
    success: data.success
  }));

const VestingSendMessageSchema: PayloadSchema<BlockDataMap['vesting_send_message']> = z
  .object({
    sender: optionalAccount,
    vesting: optionalAccount,
    message_destination: optionalAccount,
    message_value: BigIntSchema,
    query_id: BigIntSchema,
    message_boc: z.string()
  })
  .transform(data => ({
    sender: data.sender,
    vesting: data.vesting,
    messageDestination: data.message_destination,
    messageValue: data.message_value,
    queryId: data.query_id,
    messageBoc: data.message_boc
  }));

const VestingAddWhitelistSchema: PayloadSchema<BlockDataMap['vesting_add_whitelist']> = z
  .object({
    adder: optionalAccount,
    vesting: optionalAccount,
    query_id: BigIntSchema,
    accounts_added: z.array(AccountIdSchema)
  })
  .transform(data => ({
    adder: data.adder,
    vesting: data.vesting,
    queryId: data.query_id,
    accountsAdded: data.accounts_added
  }));

const UnsubscribeSchema: PayloadSchema<BlockDataMap['unsubscribe']> = z.object({
  subscriber: AccountIdSchema,
  beneficiary: optionalAccount,
  subscription: AccountIdSchema
});

const SubscribeSchema: PayloadSchema<BlockDataMap['subscribe']> = z.object({
  subscriber: AccountIdSchema,
  beneficiary: optionalAccount,
  subscription: AccountIdSchema,
  amount: BigIntSchema
});

const ElectionStakeSchema: PayloadSchema<IElectionStakeData> = z
  .object({
    stake_holder: AccountIdSchema,
    amount: optionalAmount
  })
  .transform(data => ({ stakeHolder: data.stake_holder, amount: data.amount }));

const AuctionBidSchema: PayloadSchema<BlockDataMap['auction_bid']> = z
  .object({
    bidder: AccountIdSchema,
    auction: AccountIdSchema,
    nft_address: AccountIdSchema,
    nft_collection: optionalAccount,
    nft_item_index: optionalAmount,
    amount: BigIntSchema
  })
  .transform(data => ({
    bidder: data.bidder,
    auction: data.auction,
    nftAddress: data.nft_address,
    nftCollection: data.nft_collection,
    nftItemIndex: data.nft_item_index,
    amount: data.amount
  }));

export const PAYLOAD_SCHEMAS: { readonly [K in BlockType]: PayloadSchema<BlockDataMap[K]> } = {
  call_contract: CallContractSchema,
  contract_deploy: CallContractSchema,
  ton_transfer: TonTransferSchema,
  jetton_transfer: JettonTransferSchema,
  jetton_burn: JettonBurnSchema,
  jetton_mint: JettonMintSchema,
  jetton_swap: JettonSwapSchema,
  nft_transfer: NftTransferSchema,
  nft_discovery: NftDiscoverySchema,
  nft_mint: NftMintSchema,
  dex_deposit_liquidity: DexDepositLiquiditySchema,
  dex_withdraw_liquidity: DexWithdrawLiquiditySchema,
  dedust_deposit_liquidity: DedustDepositLiquiditySchema,
  dedust_deposit_liquidity_partial: DedustDepositLiquidityPartialSchema,
  nominator_pool_deposit: NominatorPoolDepositSchema,
  nominator_pool_withdraw_request: NominatorPoolWithdrawRequestSchema,
  tonstakers_deposit: TonstakersDepositSchema,
  tonstakers_withdraw_request: TonstakersWithdrawRequestSchema,
  tonstakers_withdraw: TonstakersWithdrawSchema,
  jvault_stake: JVaultStakeSchema,
  jvault_unstake: JVaultUnstakeSchema,
  jvault_claim: JVaultClaimSchema,
  change_dns: ChangeDnsSchema,
  delete_dns: DeleteDnsSchema,
  renew_dns: RenewDnsSchema,
  multisig_create_order: MultisigCreateOrderSchema,
  multisig_approve: MultisigApproveSchema,
  vesting_send_message: VestingSendMessageSchema,
  vesting_add_whitelist: VestingAddWhitelistSchema,
  subscribe: SubscribeSchema,
  unsubscribe: UnsubscribeSchema,
  election_deposit: ElectionStakeSchema,
  election_recover: ElectionStakeSchema,
  auction_bid: AuctionBidSchema
};
