import type { Model } from 'mongoose';
import { PendingTraceModel, type PendingTraceDoc } from '../../../database/models/pending-trace-model.js';

export interface IPendingTrace {
    traceId: string;
    payload: unknown;
    attempts: number;
}

export interface IPendingTraceRepository {
    /**
     * Take up to `limit` pending traces, oldest first, counting the attempt.
     */
    claimBatch(limit: number): Promise<IPendingTrace[]>;

    markProcessed(traceIds: readonly string[]): Promise<void>;

    /**
     * Record a failure. Traces stay pending until they run out of attempts,
     * unless `terminal` marks the failure as one a retry cannot fix.
     */
    markFailed(traceId: string, error: string, terminal?: boolean): Promise<void>;
}

type PendingTraceModelLike = Pick<Model<PendingTraceDoc>, 'find' | 'updateMany' | 'updateOne'>;

export class PendingTraceRepository implements IPendingTraceRepository {
    constructor(
        private readonly maxAttempts: number,
        private readonly model: PendingTraceModelLike = PendingTraceModel
    ) {}

    async claimBatch(limit: number): Promise<IPendingTrace[]> {
        const docs = await this.model
            .find({ status: 'pending', attempts: { $lt: this.maxAttempts } })
            .sort({ createdAt: 1 })
            .limit(limit)
            .lean();

        if (!docs.length) {
            return [];
        }

        const traceIds = docs.map(doc => doc.traceId);
        await this.model.updateMany({ traceId: { $in: traceIds } }, { $inc: { attempts: 1 } });

        return docs.map(doc => ({ traceId: doc.traceId, payload: doc.payload, attempts: doc.attempts + 1 }));
    }

    async markProcessed(traceIds: readonly string[]): Promise<void> {
        if (!traceIds.length) {
            return;
        }
        await this.model.updateMany(
            { traceId: { $in: [...traceIds] } },
            { $set: { status: 'processed', processedAt: new Date(), lastError: null } }
        );
    }

    async markFailed(traceId: string, error: string, terminal = false): Promise<void> {
        await this.model.updateOne({ traceId }, { $set: { lastError: error } });
        await this.model.updateOne(
            terminal ? { traceId } : { traceId, attempts: { $gte: this.maxAttempts } },
            { $set: { status: 'failed' } }
        );
    }
}
