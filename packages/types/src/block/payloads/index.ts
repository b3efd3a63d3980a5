export type { ICallContractData, ITonTransferData } from './basic.js';
export type { IJettonBurnData, IJettonMintData, IJettonTransferData } from './jettons.js';
export type { INftDiscoveryData, INftItemRef, INftMintData, INftTransferData } from './nft.js';
export type { IJettonSwapData, ISwapTransfer } from './swaps.js';
export type {
    IDedustDepositLiquidityData,
    IDedustDepositLiquidityPartialData,
    IDexDepositLiquidityData,
    IDexWithdrawLiquidityData
} from './liquidity.js';
export type {
    IJVaultClaimData,
    IJVaultStakeData,
    IJVaultUnstakeData,
    INominatorPoolDepositData,
    INominatorPoolWithdrawRequestData,
    ITonstakersDepositData,
    ITonstakersWithdrawData,
    ITonstakersWithdrawRequestData
} from './staking.js';
export type { DnsRecordValue, DnsValueSchema, IDnsChangeRecordData, IDnsDeleteRecordData, IDnsRenewData } from './dns.js';
export type { IMultisigApproveData, IMultisigCreateOrderData } from './multisig.js';
export type { IVestingAddWhitelistData, IVestingSendMessageData } from './vesting.js';
export type { ISubscribeData, IUnsubscribeData } from './subscriptions.js';
export type { IAuctionBidData, IElectionStakeData } from './misc.js';
