import type { AnyBulkWriteOperation, Model } from 'mongoose';
import type { IAction } from '@actionindex/types';
import { ActionModel, type ActionDoc, type ActionFields } from '../../../database/models/action-model.js';

export interface IActionRepository {
    /**
     * Insert or replace actions keyed by `actionId`.
     *
     * @returns Number of actions written
     */
    upsertMany(actions: readonly IAction[]): Promise<number>;
}

export function toActionDocument(action: IAction, updatedAt: Date = new Date()): ActionFields {
    return {
        actionId: action.actionId,
        traceId: action.traceId,
        type: action.type,
        txHashes: [...action.txHashes],
        extendedTxHashes: [...action.extendedTxHashes],
        startLt: action.startLt.toString(),
        endLt: action.endLt.toString(),
        startUtime: action.startUtime,
        endUtime: action.endUtime,
        success: action.success,
        accounts: [...action.accounts],
        source: action.source,
        sourceSecondary: action.sourceSecondary,
        destination: action.destination,
        destinationSecondary: action.destinationSecondary,
        asset: action.asset,
        assetSecondary: action.assetSecondary,
        asset2: action.asset2,
        amount: action.amount,
        value: action.value,
        opcode: action.opcode,
        details: action.details,
        updatedAt
    };
}

/**
 * Mongo-backed action store.
 *
 * Action ids are deterministic, so reprocessing a trace overwrites the
 * documents it produced earlier instead of adding new ones.
 */
export class ActionRepository implements IActionRepository {
    constructor(private readonly model: Pick<Model<ActionDoc>, 'bulkWrite'> = ActionModel) {}

    async upsertMany(actions: readonly IAction[]): Promise<number> {
        if (!actions.length) {
            return 0;
        }

        const updatedAt = new Date();
        const operations: AnyBulkWriteOperation<ActionDoc>[] = actions.map(action => ({
            updateOne: {
                filter: { actionId: action.actionId },
                update: { $set: toActionDocument(action, updatedAt) },
                upsert: true
            }
        }));

        await this.model.bulkWrite(operations, { ordered: false });
        return operations.length;
    }
}
