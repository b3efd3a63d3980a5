import type { EventNode } from '../ledger/index.js';
import type { BlockDataMap, BlockType } from './BlockType.js';

/**
 * Attributes shared by every classified block regardless of its type.
 */
export interface IBlockEnvelope {
    /** Participating event nodes; order carries no meaning */
    eventNodes: EventNode[];
    minLt: bigint;
    maxLt: bigint;
    minUtime: number;
    maxUtime: number;
    /** Set when any transaction of the operation failed */
    failed: boolean;
    /**
     * Node whose message triggered the operation. It may lie outside
     * `eventNodes`, for example the wallet transaction that sent the first
     * internal message.
     */
    initiatingEventNode: EventNode | null;
}

/**
 * A classified operation with its strongly-typed payload.
 *
 * Distributes over `K` so that `Block` is a discriminated union on `btype` and
 * `Block<'ton_transfer'>` is the single member for that tag.
 */
export type Block<K extends BlockType = BlockType> = {
    [P in K]: IBlockEnvelope & { btype: P; data: BlockDataMap[P] };
}[K];

/**
 * A block whose type tag is outside the known enumeration, typically emitted
 * by a newer classifier release.
 */
export interface IUnrecognizedBlock extends IBlockEnvelope {
    btype: string;
    data: unknown;
}

/**
 * A block of a known type whose payload did not match the wire format.
 *
 * The envelope is intact, so the block still yields an action with the
 * type-independent fields; `issues` holds the validation failures.
 */
export interface IMalformedBlock extends IBlockEnvelope {
    btype: BlockType;
    data: unknown;
    malformed: true;
    issues: unknown;
}

/**
 * Anything the dispatcher may receive.
 */
export type IncomingBlock = Block | IUnrecognizedBlock | IMalformedBlock;
