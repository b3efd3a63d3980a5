/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { BLOCK_TYPES, type DnsRecordValue, type ISwapTransfer } from '@actionindex/types';
import { createNormalizerContext, NORMALIZERS } from '../normalizers/index.js';
import { normalizeJettonSwap } from '../normalizers/swaps.js';
import { normalizeJettonBurn, normalizeJettonMint, normalizeJettonTransfer } from '../normalizers/jettons.js';
import { normalizeChangeDns, normalizeDeleteDns, normalizeRenewDns } from '../normalizers/dns.js';
import {
    normalizeDedustDepositLiquidity,
    normalizeDedustDepositLiquidityPartial,
    normalizeDexDepositLiquidity,
    normalizeDexWithdrawLiquidity
} from '../normalizers/liquidity.js';
import { normalizeMultisigApprove, normalizeMultisigCreateOrder } from '../normalizers/multisig.js';
import { normalizeAuctionBid } from '../normalizers/misc.js';
import { normalizeNftDiscovery, normalizeNftMint, normalizeNftTransfer } from '../normalizers/nft.js';
import { normalizeJVaultClaim, normalizeJVaultStake, normalizeJVaultUnstake } from '../normalizers/jvault.js';
import {
    normalizeNominatorPoolDeposit,
    normalizeTonstakersDeposit,
    normalizeTonstakersWithdraw,
    normalizeTonstakersWithdrawRequest
} from '../normalizers/staking.js';
import { normalizeSubscribe, normalizeUnsubscribe } from '../normalizers/subscriptions.js';
import { normalizeVestingAddWhitelist, normalizeVestingSendMessage } from '../normalizers/vesting.js';
import { blockToAction } from '../block-to-action.js';
import { Asset } from '../../../lib/ton-address.js';
import { account, createMockLogger, makeBlock, raw } from './helpers.js';

function leg(overrides: Partial<ISwapTransfer> = {}): ISwapTransfer {
    return {
        amount: 100n,
        source: null,
        sourceJettonWallet: null,
        destination: null,
        destinationJettonWallet: null,
        asset: null,
        ...overrides
    };
}

describe('NORMALIZERS', () => {
    it('covers every block type', () => {
        expect(Object.keys(NORMALIZERS).sort()).toEqual([...BLOCK_TYPES].sort());
    });
});

describe('jettons', () => {
    it('keeps the amounts of a mint empty when no notification was observed', () => {
        const patch = normalizeJettonMint(
            makeBlock('jetton_mint', {
                to: account(0x03),
                toJettonWallet: null,
                asset: Asset.jetton(account(0x0a)),
                amount: null,
                tonAmount: null
            })
        );

        expect(patch).toEqual({
            destination: raw(0x03),
            destinationSecondary: null,
            asset: raw(0x0a),
            amount: null,
            value: null
        });
    });

    it('resolves the burnt asset to its master contract', () => {
        const logger = createMockLogger();

        const patch = normalizeJettonBurn(
            makeBlock('jetton_burn', {
                owner: account(0x02),
                jettonWallet: account(0x12),
                asset: Asset.jetton(account(0x0a)),
                amount: 5n
            }),
            createNormalizerContext('jetton_burn', 'trace-1', logger)
        );

        expect(patch).toEqual({ source: raw(0x02), sourceSecondary: raw(0x12), asset: raw(0x0a), amount: '5' });
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('warns when a burn has no owner', () => {
        const logger = createMockLogger();

        const patch = normalizeJettonBurn(
            makeBlock('jetton_burn', { owner: null, jettonWallet: account(0x12), asset: Asset.jetton(account(0x0a)), amount: 5n }),
            createNormalizerContext('jetton_burn', 'trace-4', logger)
        );

        expect(patch.source).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith(
            { field: 'source', btype: 'jetton_burn', traceId: 'trace-4' },
            'Block is missing an expected field'
        );
    });

    it('warns for each transfer participant the classifier left empty', () => {
        const logger = createMockLogger();

        const patch = normalizeJettonTransfer(
            makeBlock('jetton_transfer', {
                sender: null,
                senderWallet: account(0x12),
                receiver: null,
                receiverWallet: null,
                amount: 1n,
                asset: null,
                queryId: 0n,
                responseAddress: null,
                forwardAmount: 0n,
                customPayload: null,
                forwardPayload: null,
                comment: null,
                encryptedComment: false
            }),
            createNormalizerContext('jetton_transfer', 'trace-1', logger)
        );

        expect(patch).toMatchObject({ source: null, sourceSecondary: raw(0x12), destination: null, amount: '1' });
        expect(logger.warn.mock.calls.map(([fields]) => fields)).toEqual([
            { field: 'source', btype: 'jetton_transfer', traceId: 'trace-1' },
            { field: 'destination', btype: 'jetton_transfer', traceId: 'trace-1' }
        ]);
    });
});

describe('jetton swap', () => {
    const incoming = leg({
        amount: 1_000n,
        source: account(0x02),
        sourceJettonWallet: account(0x12),
        destination: account(0x0d),
        asset: Asset.jetton(account(0x0a))
    });
    const outgoing = leg({
        amount: 2_000n,
        source: account(0x0d),
        destination: account(0x02),
        destinationJettonWallet: account(0x22),
        asset: Asset.jetton(account(0x0b))
    });

    it('takes assets and participants from the legs', () => {
        const patch = normalizeJettonSwap(
            makeBlock('jetton_swap', {
                dex: 'stonfi',
                sender: account(0x02),
                dexIncomingTransfer: incoming,
                dexOutgoingTransfer: outgoing,
                sourceAsset: null,
                destinationAsset: null,
                destinationWallet: null
            })
        );

        expect(patch).toMatchObject({
            source: raw(0x02),
            sourceSecondary: raw(0x12),
            destination: raw(0x02),
            destinationSecondary: raw(0x22),
            asset: raw(0x0a),
            asset2: raw(0x0b)
        });
        expect(patch.details).toEqual({
            kind: 'jetton_swap',
            dex: 'stonfi',
            sender: raw(0x02),
            dexIncomingTransfer: {
                amount: '1000',
                source: raw(0x02),
                sourceJettonWallet: raw(0x12),
                destination: raw(0x0d),
                destinationJettonWallet: null,
                asset: raw(0x0a)
            },
            dexOutgoingTransfer: {
                amount: '2000',
                source: raw(0x0d),
                sourceJettonWallet: null,
                destination: raw(0x02),
                destinationJettonWallet: raw(0x22),
                asset: raw(0x0b)
            }
        });
    });

    it('uses the reported assets for stonfi_v2', () => {
        const patch = normalizeJettonSwap(
            makeBlock('jetton_swap', {
                dex: 'stonfi_v2',
                sender: null,
                dexIncomingTransfer: incoming,
                dexOutgoingTransfer: outgoing,
                sourceAsset: Asset.native(),
                destinationAsset: Asset.jetton(account(0x0f)),
                destinationWallet: null
            })
        );

        expect(patch.asset).toBeNull();
        expect(patch.asset2).toBe(raw(0x0f));
    });

    it('prefers an explicit destination asset and wallet on any dex', () => {
        const patch = normalizeJettonSwap(
            makeBlock('jetton_swap', {
                dex: 'dedust',
                sender: null,
                dexIncomingTransfer: incoming,
                dexOutgoingTransfer: outgoing,
                sourceAsset: Asset.jetton(account(0x0e)),
                destinationAsset: Asset.jetton(account(0x0f)),
                destinationWallet: account(0x33)
            })
        );

        expect(patch.asset).toBe(raw(0x0a));
        expect(patch.asset2).toBe(raw(0x0f));
        expect(patch.destinationSecondary).toBe(raw(0x33));
    });
});

describe('dex liquidity', () => {
    it('reports each side of a deposit', () => {
        const patch = normalizeDexDepositLiquidity(
            makeBlock('dex_deposit_liquidity', {
                dex: 'stonfi_v2',
                sender: account(0x02),
                pool: account(0x55),
                amount1: 10n,
                amount2: null,
                asset1: Asset.native(),
                asset2: Asset.jetton(account(0x0b)),
                senderWallet1: null,
                senderWallet2: account(0x22),
                lpTokensMinted: 30n
            })
        );

        expect(patch).toEqual({
            source: raw(0x02),
            destination: raw(0x55),
            details: {
                kind: 'dex_deposit_liquidity',
                dex: 'stonfi_v2',
                amount1: '10',
                amount2: null,
                asset1: null,
                asset2: raw(0x0b),
                userJettonWallet1: null,
                userJettonWallet2: raw(0x22),
                lpTokensMinted: '30'
            }
        });
    });

    it('reports each side of a withdrawal and whether it was refunded', () => {
        const patch = normalizeDexWithdrawLiquidity(
            makeBlock('dex_withdraw_liquidity', {
                dex: 'stonfi',
                sender: account(0x02),
                senderWallet: account(0x12),
                pool: account(0x55),
                asset: Asset.jetton(account(0x56)),
                amount1Out: 10n,
                amount2Out: 20n,
                asset1Out: Asset.native(),
                asset2Out: Asset.jetton(account(0x0b)),
                wallet1: null,
                wallet2: account(0x22),
                dexJettonWallet1: null,
                dexWallet1: account(0x31),
                dexWallet2: account(0x32),
                dexJettonWallet2: account(0x33),
                isRefund: true,
                lpTokensBurnt: 7n
            })
        );

        expect(patch).toEqual({
            source: raw(0x02),
            sourceSecondary: raw(0x12),
            destination: raw(0x55),
            asset: raw(0x56),
            details: {
                kind: 'dex_withdraw_liquidity',
                dex: 'stonfi',
                amount1: '10',
                amount2: '20',
                assetOut1: null,
                assetOut2: raw(0x0b),
                userJettonWallet1: null,
                userJettonWallet2: raw(0x22),
                dexJettonWallet1: null,
                dexWallet1: raw(0x31),
                dexWallet2: raw(0x32),
                dexJettonWallet2: raw(0x33),
                isRefund: true,
                lpTokensBurnt: '7'
            }
        });
    });
});

describe('dedust deposits', () => {
    const common = {
        dex: 'dedust',
        sender: account(0x02),
        depositContract: account(0x44),
        asset1: Asset.native(),
        amount1: 10n,
        asset2: Asset.jetton(account(0x0b)),
        amount2: 20n,
        userJettonWallet1: null,
        userJettonWallet2: account(0x22)
    };

    it('relabels a completed deposit as a dex liquidity deposit', () => {
        const patch = normalizeDedustDepositLiquidity(
            makeBlock('dedust_deposit_liquidity', { ...common, poolAddress: account(0x55), lpTokensMinted: 30n })
        );

        expect(patch).toEqual({
            type: 'dex_deposit_liquidity',
            source: raw(0x02),
            destination: raw(0x55),
            destinationSecondary: raw(0x44),
            details: {
                kind: 'dex_deposit_liquidity',
                dex: 'dedust',
                asset1: null,
                amount1: '10',
                asset2: raw(0x0b),
                amount2: '20',
                userJettonWallet1: null,
                userJettonWallet2: raw(0x22),
                lpTokensMinted: '30'
            }
        });
    });

    it('leaves the pool and minted tokens empty for a partial deposit', () => {
        const patch = normalizeDedustDepositLiquidityPartial(makeBlock('dedust_deposit_liquidity_partial', common));

        expect(patch.type).toBe('dex_deposit_liquidity');
        expect(patch.destination).toBeUndefined();
        expect(patch.destinationSecondary).toBe(raw(0x44));
        expect(patch.details).toMatchObject({ lpTokensMinted: null, amount2: '20' });
    });
});

describe('dns', () => {
    const key = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);

    it('renders each record value schema', () => {
        const change = (value: DnsRecordValue) =>
            normalizeChangeDns(makeBlock('change_dns', { source: account(0x02), destination: account(0x06), key, value }))
                .details;

        expect(change({ schema: 'DNSNextResolver', address: account(0x07) })).toEqual({
            kind: 'change_dns_record',
            valueSchema: 'DNSNextResolver',
            key: 'deadbeef',
            address: raw(0x07),
            flags: null,
            dnsText: null
        });
        expect(change({ schema: 'DNSSmcAddress', address: account(0x07), flags: 1 })).toMatchObject({
            address: raw(0x07),
            flags: 1
        });
        expect(change({ schema: 'DNSAdnlAddress', address: new Uint8Array([0x0a, 0xff]), flags: 0 })).toMatchObject({
            valueSchema: 'DNSAdnlAddress',
            address: '0aff',
            flags: 0
        });
        expect(change({ schema: 'DNSText', dnsText: 'hello' })).toMatchObject({
            address: null,
            flags: null,
            dnsText: 'hello'
        });
    });

    it('reports deletion as a change with no value', () => {
        const patch = normalizeDeleteDns(makeBlock('delete_dns', { source: null, destination: account(0x06), key }));

        expect(patch).toEqual({
            source: null,
            destination: raw(0x06),
            details: {
                kind: 'change_dns_record',
                valueSchema: null,
                flags: null,
                address: null,
                key: 'deadbeef',
                dnsText: null
            }
        });
    });

    it('reports renewals with their participants only', () => {
        const patch = normalizeRenewDns(makeBlock('renew_dns', { source: account(0x02), destination: null }));

        expect(patch).toEqual({ source: raw(0x02), destination: null });
    });
});

describe('multisig', () => {
    it('overrides success with the approval outcome', () => {
        const patch = normalizeMultisigApprove(
            makeBlock('multisig_approve', {
                signer: account(0x02),
                order: account(0x08),
                signerIndex: 2,
                exitCode: 107,
                success: false
            })
        );

        expect(patch.success).toBe(false);
        expect(patch.details).toEqual({ kind: 'multisig_approve', signerIndex: 2, exitCode: 107 });
    });

    it('warns when the order has no multisig wallet', () => {
        const logger = createMockLogger();
        const ctx = createNormalizerContext('multisig_create_order', 'trace-9', logger);

        const patch = normalizeMultisigCreateOrder(
            makeBlock('multisig_create_order', {
                createdBy: account(0x02),
                multisig: null,
                orderContractAddress: account(0x08),
                queryId: 1n,
                orderSeqno: 18_446_744_073_709_551_615n,
                isCreatedBySigner: true,
                creatorApproved: true,
                creatorIndex: 0,
                expirationDate: 1_700_003_600,
                orderBoc: 'te6c'
            }),
            ctx
        );

        expect(patch.destination).toBeNull();
        expect(patch.details).toMatchObject({ orderSeqno: '18446744073709551615', isSignedByCreator: true });
        expect(logger.warn).toHaveBeenCalledWith(
            { field: 'multisig', btype: 'multisig_create_order', traceId: 'trace-9' },
            'Block is missing an expected field'
        );
    });
});

describe('nft', () => {
    const nft = { address: account(0x0a), index: 42n, collection: account(0x0c) };

    it('reports the price only for purchases', () => {
        const ctx = createNormalizerContext('nft_transfer', 'trace-1', createMockLogger());
        const transfer = (isPurchase: boolean) =>
            normalizeNftTransfer(
                makeBlock('nft_transfer', {
                    prevOwner: account(0x02),
                    newOwner: account(0x03),
                    nft,
                    queryId: 3n,
                    isPurchase,
                    price: 500n,
                    forwardAmount: null,
                    customPayload: null,
                    forwardPayload: null,
                    responseDestination: null
                }),
                ctx
            );

        expect(transfer(true).details).toMatchObject({ isPurchase: true, price: '500', nftItemIndex: '42', queryId: '3' });
        expect(transfer(false).details).toMatchObject({ isPurchase: false, price: null });
        expect(transfer(false)).toMatchObject({
            source: raw(0x02),
            destination: raw(0x03),
            asset: raw(0x0c),
            assetSecondary: raw(0x0a)
        });
    });

    it('uses the minted item as both destination and secondary asset', () => {
        const patch = normalizeNftMint(
            makeBlock('nft_mint', { source: null, address: account(0x0a), collection: null, index: null, opcode: 1 })
        );

        expect(patch).toEqual({
            source: null,
            destination: raw(0x0a),
            assetSecondary: raw(0x0a),
            asset: null,
            opcode: 1,
            details: { kind: 'nft_mint', nftItemIndex: null }
        });
    });

    it('reports the collection and index a discovery resolved', () => {
        const patch = normalizeNftDiscovery(
            makeBlock('nft_discovery', {
                sender: account(0x02),
                nft: account(0x0a),
                queryId: 4n,
                resultCollection: account(0x0c),
                resultIndex: 42n
            })
        );

        expect(patch).toEqual({
            source: raw(0x02),
            destination: raw(0x0a),
            details: { kind: 'nft_discovery', queryId: '4', collectionAddress: raw(0x0c), nftItemIndex: '42' }
        });
    });

    it('describes auction bids as nft transfers carrying only the item index', () => {
        const patch = normalizeAuctionBid(
            makeBlock('auction_bid', {
                bidder: account(0x02),
                auction: account(0x0d),
                nftAddress: account(0x0a),
                nftCollection: account(0x0c),
                nftItemIndex: 9n,
                amount: 3_000n
            })
        );

        expect(patch.value).toBe('3000');
        expect(patch.amount).toBeUndefined();
        expect(patch.details).toEqual({
            kind: 'nft_transfer',
            queryId: null,
            isPurchase: null,
            price: null,
            nftItemIndex: '9',
            forwardAmount: null,
            customPayload: null,
            forwardPayload: null,
            responseDestination: null
        });
    });
});

describe('staking and vesting', () => {
    it('lists claimed jettons in raw form', () => {
        const patch = normalizeJVaultClaim(
            makeBlock('jvault_claim', {
                sender: account(0x02),
                stakeWallet: account(0x12),
                stakingPool: account(0x0e),
                claimedJettons: [account(0x0a), account(0x0b, -1)],
                claimedAmounts: [1n, 2n]
            })
        );

        expect(patch.details).toEqual({
            kind: 'jvault_claim',
            claimedJettons: [raw(0x0a), raw(0x0b, -1)],
            claimedAmounts: ['1', '2']
        });
        expect(patch.sourceSecondary).toBe(raw(0x12));
    });

    it('reports nominator pool deposits as stake deposits', () => {
        const patch = normalizeNominatorPoolDeposit(
            makeBlock('nominator_pool_deposit', { source: account(0x02), pool: account(0x0e), value: 100n })
        );

        expect(patch).toEqual({
            type: 'stake_deposit',
            source: raw(0x02),
            destination: raw(0x0e),
            amount: '100',
            details: { kind: 'staking', provider: 'nominator', tsNft: null }
        });
    });

    it('reports tonstakers deposits as stake deposits and warns without a pool', () => {
        const logger = createMockLogger();

        const patch = normalizeTonstakersDeposit(
            makeBlock('tonstakers_deposit', { source: account(0x02), pool: null, value: 100n }),
            createNormalizerContext('tonstakers_deposit', 'trace-1', logger)
        );

        expect(patch).toEqual({
            type: 'stake_deposit',
            source: raw(0x02),
            destination: null,
            amount: '100',
            details: { kind: 'staking', provider: 'tonstakers', tsNft: null }
        });
        expect(logger.warn).toHaveBeenCalledWith(
            { field: 'pool', btype: 'tonstakers_deposit', traceId: 'trace-1' },
            'Block is missing an expected field'
        );
    });

    it('records the burnt receipt of a tonstakers withdrawal', () => {
        const patch = normalizeTonstakersWithdraw(
            makeBlock('tonstakers_withdraw', {
                stakeHolder: account(0x02),
                pool: account(0x0e),
                amount: 90n,
                burntNft: account(0x0a)
            }),
            createNormalizerContext('tonstakers_withdraw', 'trace-1', createMockLogger())
        );

        expect(patch).toEqual({
            type: 'stake_withdrawal',
            source: raw(0x02),
            destination: raw(0x0e),
            amount: '90',
            details: { kind: 'staking', provider: 'tonstakers', tsNft: raw(0x0a) }
        });
    });

    it('reports the lock period and minted jettons of a jvault stake', () => {
        const participants = { sender: account(0x02), stakeWallet: account(0x12), stakingPool: account(0x0e) };

        const stake = normalizeJVaultStake(
            makeBlock('jvault_stake', { ...participants, stakedAmount: 500n, period: 2_592_000, mintedStakeJettons: 500n })
        );
        const unstake = normalizeJVaultUnstake(makeBlock('jvault_unstake', { ...participants, unstakedAmount: 400n }));

        expect(stake).toEqual({
            source: raw(0x02),
            sourceSecondary: raw(0x12),
            destination: raw(0x0e),
            amount: '500',
            details: { kind: 'jvault_stake', period: 2_592_000, mintedStakeJettons: '500' }
        });
        expect(unstake).toEqual({
            source: raw(0x02),
            sourceSecondary: raw(0x12),
            destination: raw(0x0e),
            amount: '400'
        });
    });

    it('lists the accounts added to a vesting whitelist', () => {
        const patch = normalizeVestingAddWhitelist(
            makeBlock('vesting_add_whitelist', {
                adder: account(0x02),
                vesting: account(0x0e),
                queryId: 9n,
                accountsAdded: [account(0x03), account(0x04, -1)]
            }),
            createNormalizerContext('vesting_add_whitelist', 'trace-1', createMockLogger())
        );

        expect(patch).toEqual({
            source: raw(0x02),
            destination: raw(0x0e),
            details: { kind: 'vesting_add_whitelist', queryId: '9', accountsAdded: [raw(0x03), raw(0x04, -1)] }
        });
    });

    it('records the minted receipt of a tonstakers withdrawal request', () => {
        const ctx = createNormalizerContext('tonstakers_withdraw_request', 'trace-1', createMockLogger());

        const patch = normalizeTonstakersWithdrawRequest(
            makeBlock('tonstakers_withdraw_request', {
                source: account(0x02),
                tsTonWallet: account(0x12),
                pool: account(0x0e),
                tokensBurnt: 77n,
                mintedNft: account(0x0a)
            }),
            ctx
        );

        expect(patch).toEqual({
            type: 'stake_withdrawal_request',
            source: raw(0x02),
            sourceSecondary: raw(0x12),
            destination: raw(0x0e),
            amount: '77',
            details: { kind: 'staking', provider: 'tonstakers', tsNft: raw(0x0a) }
        });
    });

    it('adds the forwarded message recipient to the vesting action', () => {
        const ctx = createNormalizerContext('vesting_send_message', 'trace-1', createMockLogger());

        const patch = normalizeVestingSendMessage(
            makeBlock('vesting_send_message', {
                sender: account(0x02),
                vesting: account(0x0e),
                messageDestination: account(0x03),
                messageValue: 5n,
                queryId: 0n,
                messageBoc: 'te6c'
            }),
            ctx
        );

        expect(patch.destinationSecondary).toBe(raw(0x03));
        expect(patch.amount).toBe('5');
    });
});

describe('contract calls', () => {
    it('shares one shape between calls and deployments', () => {
        const data = { opcode: 0x0f8a7ea5, source: account(0x02), destination: null, value: 0n };

        const call = blockToAction(makeBlock('call_contract', data), 'trace-1', createMockLogger());
        const deploy = blockToAction(makeBlock('contract_deploy', data), 'trace-1', createMockLogger());

        expect(call.opcode).toBe(0x0f8a7ea5);
        expect(call.value).toBe('0');
        expect(deploy.type).toBe('contract_deploy');
        expect(deploy.source).toBe(call.source);
        expect(deploy.actionId).not.toBe(call.actionId);
    });
});

describe('subscriptions', () => {
    it('sets the amount only for subscriptions', () => {
        const subscribe = normalizeSubscribe(
            makeBlock('subscribe', {
                subscriber: account(0x02),
                beneficiary: null,
                subscription: account(0x0e),
                amount: 1_000n
            })
        );
        const unsubscribe = normalizeUnsubscribe(
            makeBlock('unsubscribe', { subscriber: account(0x02), beneficiary: account(0x03), subscription: account(0x0e) })
        );

        expect(subscribe).toEqual({
            source: raw(0x02),
            destination: null,
            destinationSecondary: raw(0x0e),
            amount: '1000'
        });
        expect(unsubscribe).toEqual({ source: raw(0x02), destination: raw(0x03), destinationSecondary: raw(0x0e) });
        expect(unsubscribe).not.toHaveProperty('amount');
    });
});

describe('elections', () => {
    it('maps deposits and recovers the same way', () => {
        const deposit = blockToAction(
            makeBlock('election_deposit', { stakeHolder: account(0x02), amount: 10n }),
            'trace-1',
            createMockLogger()
        );
        const recover = blockToAction(
            makeBlock('election_recover', { stakeHolder: account(0x02), amount: null }),
            'trace-1',
            createMockLogger()
        );

        expect(NORMALIZERS.election_deposit).toBe(NORMALIZERS.election_recover);
        expect(deposit).toMatchObject({ type: 'election_deposit', source: raw(0x02), amount: '10' });
        expect(recover).toMatchObject({ type: 'election_recover', source: raw(0x02), amount: null });
    });
});
