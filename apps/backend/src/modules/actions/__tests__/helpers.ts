import { vi } from 'vitest';
import type { Block, BlockDataMap, BlockType, EventNode, IBlockEnvelope } from '@actionindex/types';
import { AccountId } from '../../../lib/ton-address.js';

/**
 * Account whose 32-byte hash is `byte` repeated; `raw(0xab)` is "0:ABAB...AB".
 */
export function account(byte: number, workchain = 0): AccountId {
    return AccountId.fromParts(workchain, new Uint8Array(32).fill(byte));
}

export function raw(byte: number, workchain = 0): string {
    return account(byte, workchain).toRawString();
}

export function messageNode(lt: bigint, msgHash: string, tx: { hash: string; account: string } | null): EventNode {
    return {
        kind: 'message',
        lt,
        message: {
            msgHash,
            transaction: tx ? { hash: tx.hash, account: tx.account, lt, utime: 1_700_000_000 } : null
        }
    };
}

export function tickTockNode(lt: bigint, hash: string, accountRaw: string): EventNode {
    return {
        kind: 'tick_tock',
        lt,
        transaction: { hash, account: accountRaw, lt, utime: 1_700_000_000 }
    };
}

export function makeBlock<K extends BlockType>(
    btype: K,
    data: BlockDataMap[K],
    envelope: Partial<IBlockEnvelope> = {}
): Block<K> {
    const block: Block<K> = {
        eventNodes: [messageNode(100n, 'msg-1', { hash: 'tx-1', account: raw(0x01) })],
        minLt: 100n,
        maxLt: 200n,
        minUtime: 1_700_000_000,
        maxUtime: 1_700_000_005,
        failed: false,
        initiatingEventNode: null,
        ...envelope,
        btype,
        data
    };
    return block;
}

export function createMockLogger() {
    const logger = {
        fatal: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        trace: vi.fn(),
        child: vi.fn()
    };
    logger.child.mockReturnValue(logger);
    return logger;
}
