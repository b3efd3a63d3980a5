import type { ActionType } from './ActionType.js';
import type { ActionDetails } from './IActionDetails.js';

/**
 * Canonical, storage-ready record of one detected operation within a trace.
 *
 * Produced once per block by the normalizer and never mutated afterwards; the
 * normalizer returns it frozen. Persistence deduplicates on `actionId`.
 */
export interface IAction {
    traceId: string;
    /** base64(sha256(root message hash or tx hash + block type)) */
    actionId: string;
    /**
     * An `ActionType` for recognized blocks; the raw tag of an unrecognized
     * block passes through unchanged.
     */
    type: string;
    /** Distinct hashes of the block's own transactions */
    txHashes: string[];
    /** `txHashes` plus the transaction that initiated the operation */
    extendedTxHashes: string[];
    startLt: bigint;
    endLt: bigint;
    startUtime: number;
    endUtime: number;
    success: boolean;
    /** Participating accounts, raw form, no duplicates */
    accounts: string[];

    source: string | null;
    sourceSecondary: string | null;
    destination: string | null;
    destinationSecondary: string | null;
    asset: string | null;
    assetSecondary: string | null;
    asset2: string | null;
    /** Asset amount in the asset's smallest unit */
    amount: string | null;
    /** Native value in nanotons */
    value: string | null;
    opcode: number | null;

    details: ActionDetails | null;
}

/**
 * Fields a type-specific normalizer may set on top of the base record.
 */
export type ActionFields = { type: ActionType } & Pick<
    IAction,
    | 'success'
    | 'source'
    | 'sourceSecondary'
    | 'destination'
    | 'destinationSecondary'
    | 'asset'
    | 'assetSecondary'
    | 'asset2'
    | 'amount'
    | 'value'
    | 'opcode'
    | 'details'
>;
