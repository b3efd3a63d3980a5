import type { ActionFields, Block, BlockType, ILogger } from '@actionindex/types';
import { resolveAddress, type AddressRef } from '../address.js';

/**
 * Fields a variant normalizer contributes on top of the base action.
 *
 * Patches never carry `undefined` values; a key is either set or omitted.
 */
export type ActionPatch = Partial<ActionFields>;

export interface INormalizerContext {
    readonly traceId: string;
    readonly btype: BlockType;
    readonly logger: ILogger;

    /**
     * Resolve a reference the action cannot be read without, warning when the
     * classifier left it empty.
     */
    expectAddress(ref: AddressRef, field: string): string | null;
}

export type Normalizer<K extends BlockType> = (block: Block<K>, ctx: INormalizerContext) => ActionPatch;

/**
 * One normalizer per block type. Adding a tag to `BlockDataMap` without adding
 * its normalizer here fails to compile.
 */
export type NormalizerTable = { readonly [K in BlockType]: Normalizer<K> };

export function createNormalizerContext(btype: BlockType, traceId: string, logger: ILogger): INormalizerContext {
    return {
        traceId,
        btype,
        logger,
        expectAddress(ref, field) {
            const address = resolveAddress(ref);
            if (address === null) {
                logger.warn({ field, btype, traceId }, 'Block is missing an expected field');
            }
            return address;
        }
    };
}
