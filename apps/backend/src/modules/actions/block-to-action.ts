import {
    isBlockType,
    type Block,
    type BlockType,
    type IAction,
    type IMalformedBlock,
    type IncomingBlock,
    type ILogger
} from '@actionindex/types';
import { ActionBuilder } from './action-builder.js';
import { createNormalizerContext, NORMALIZERS, type ActionPatch, type INormalizerContext, type Normalizer } from './normalizers/index.js';

export function isMalformedBlock(block: IncomingBlock): block is IMalformedBlock {
    return 'malformed' in block && block.malformed === true;
}

export function isRecognizedBlock(block: IncomingBlock): block is Block {
    return isBlockType(block.btype) && !isMalformedBlock(block);
}

function normalizeVariant<K extends BlockType>(btype: K, block: Block<K>, ctx: INormalizerContext): ActionPatch {
    const normalizer: Normalizer<K> = NORMALIZERS[btype];
    return normalizer(block, ctx);
}

/**
 * Convert one classified block into a frozen action record.
 *
 * Never throws: a block that cannot be normalized yields the base record and
 * the reason is logged.
 *
 * @param block - Block produced by the classifier
 * @param traceId - Trace the block belongs to
 * @param logger - Receives diagnostics for this block
 */
export function blockToAction(block: IncomingBlock, traceId: string, logger: ILogger): IAction {
    const base = ActionBuilder.fromBlock(block, traceId);
    let builder = base;

    if (isRecognizedBlock(block)) {
        try {
            const ctx = createNormalizerContext(block.btype, traceId, logger);
            builder = base.apply(normalizeVariant(block.btype, block, ctx));
        } catch (error) {
            logger.error(
                { error, btype: block.btype, traceId, actionId: base.actionId },
                'Failed to normalize block, keeping base action fields'
            );
        }
    } else if (isMalformedBlock(block)) {
        logger.warn(
            { btype: block.btype, traceId, actionId: base.actionId },
            'Malformed block payload, keeping base action fields'
        );
    } else {
        logger.warn({ btype: block.btype, traceId }, `Unknown block type ${block.btype}`);
    }

    return builder.build(block, logger);
}
