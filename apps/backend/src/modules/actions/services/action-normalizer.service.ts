import type { IAction, IncomingBlock, ILogger } from '@actionindex/types';
import { blockToAction } from '../block-to-action.js';

/**
 * Normalizes every block of a classified trace into action records.
 *
 * Blocks are independent: one block's diagnostics or failure never affects
 * the others, and the output keeps the block order of the trace.
 */
export class ActionNormalizerService {
    constructor(private readonly logger: ILogger) {}

    normalizeTrace(traceId: string, blocks: readonly IncomingBlock[]): IAction[] {
        const traceLogger = this.logger.child({ traceId });
        const actions = blocks.map(block => blockToAction(block, traceId, traceLogger));

        traceLogger.debug(
            { blocks: blocks.length, types: countByType(actions) },
            'Trace normalized'
        );

        return actions;
    }
}

function countByType(actions: readonly IAction[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const action of actions) {
        counts[action.type] = (counts[action.type] ?? 0) + 1;
    }
    return counts;
}
