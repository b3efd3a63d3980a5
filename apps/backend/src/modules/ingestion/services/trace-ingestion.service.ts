import mongoose from 'mongoose';
import type { IAction, ILogger } from '@actionindex/types';
import { DecodeError, errorMessage } from '../../../lib/errors.js';
import { retry, type RetryOptions } from '../../../lib/retry.js';
import type { ActionNormalizerService } from '../../actions/services/action-normalizer.service.js';
import { decodeTrace } from '../codec/index.js';
import type { IActionRepository, IPendingTraceRepository } from '../repositories/index.js';

export interface ITraceIngestionOptions {
    batchSize: number;
    writeRetry?: Pick<RetryOptions, 'retries' | 'delayMs' | 'factor'>;
}

export interface IIngestionRunResult {
    claimed: number;
    processed: number;
    failed: number;
    actions: number;
    skipped?: boolean;
}

// Schema validation rejections (code 121) fail the same way on every attempt
function isTransientWriteError(error: unknown): boolean {
    return !(error instanceof mongoose.mongo.MongoServerError && error.code === 121);
}

/**
 * Moves classified traces from the pending queue into the action store.
 *
 * One run claims a batch, decodes and normalizes each trace, writes the
 * resulting actions in a single bulk upsert and marks the traces processed.
 * A trace whose payload cannot be decoded is marked failed on its own; a
 * failed write leaves the whole batch pending for the next run.
 */
export class TraceIngestionService {
    private running = false;

    constructor(
        private readonly traces: IPendingTraceRepository,
        private readonly actions: IActionRepository,
        private readonly normalizer: ActionNormalizerService,
        private readonly logger: ILogger,
        private readonly options: ITraceIngestionOptions
    ) {}

    async runOnce(): Promise<IIngestionRunResult> {
        if (this.running) {
            this.logger.warn('Trace ingestion already in progress, skipping run');
            return { claimed: 0, processed: 0, failed: 0, actions: 0, skipped: true };
        }

        this.running = true;
        try {
            return await this.processBatch();
        } finally {
            this.running = false;
        }
    }

    private async processBatch(): Promise<IIngestionRunResult> {
        const batch = await this.traces.claimBatch(this.options.batchSize);
        if (!batch.length) {
            return { claimed: 0, processed: 0, failed: 0, actions: 0 };
        }

        const actions: IAction[] = [];
        const processedIds: string[] = [];
        let failed = 0;

        for (const pending of batch) {
            try {
                const trace = decodeTrace(pending.payload, this.logger);
                if (trace.traceId !== pending.traceId) {
                    throw new DecodeError('Payload trace id does not match the queued trace', {
                        expected: pending.traceId,
                        received: trace.traceId
                    });
                }
                actions.push(...this.normalizer.normalizeTrace(trace.traceId, trace.blocks));
                processedIds.push(pending.traceId);
            } catch (error) {
                failed += 1;
                const terminal = error instanceof DecodeError;
                this.logger.error(
                    {
                        traceId: pending.traceId,
                        attempts: pending.attempts,
                        error: errorMessage(error),
                        details: error instanceof DecodeError ? error.details : undefined
                    },
                    'Failed to process trace'
                );
                await this.traces.markFailed(pending.traceId, errorMessage(error), terminal);
            }
        }

        const written = await retry(() => this.actions.upsertMany(actions), {
            ...this.options.writeRetry,
            shouldRetry: isTransientWriteError,
            onRetry: (attempt, error) =>
                this.logger.warn({ attempt, error: errorMessage(error), actions: actions.length }, 'Retrying action upsert')
        });

        await this.traces.markProcessed(processedIds);

        const result = { claimed: batch.length, processed: processedIds.length, failed, actions: written };
        this.logger.info(result, 'Trace batch normalized');
        return result;
    }
}
