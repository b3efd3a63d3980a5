/**
 * Actions module implementation.
 *
 * Turns classified traces waiting in the pending queue into stored action
 * records. The module owns the normalizer service and the ingestion service,
 * and drives ingestion from the shared scheduler.
 *
 * ## Design Decisions
 *
 * **Stateless normalization**: the normalizer holds nothing between blocks, so
 * the periodic job can be restarted or run twice over the same trace and
 * produce the same documents (action ids are deterministic).
 *
 * **Injected persistence**: repositories are passed in through the module
 * dependencies; tests and tools can run the module against in-memory stores.
 */

import type { IModule, IModuleMetadata, ILogger } from '@actionindex/types';
import type { IActionRepository, IPendingTraceRepository } from '../ingestion/repositories/index.js';
import { TraceIngestionService, type ITraceIngestionOptions } from '../ingestion/services/trace-ingestion.service.js';
import type { SchedulerService } from '../scheduler/index.js';
import { ActionNormalizerService } from './services/action-normalizer.service.js';

/**
 * Dependencies required by the actions module, injected at bootstrap.
 */
export interface IActionsModuleDependencies {
    logger: ILogger;
    scheduler: SchedulerService;
    pendingTraces: IPendingTraceRepository;
    actions: IActionRepository;

    /**
     * Job settings; `enabled: false` keeps the job off the scheduler so traces
     * are only processed by explicit `runOnce()` calls.
     */
    job: ITraceIngestionOptions & {
        name: string;
        schedule: string;
        enabled: boolean;
    };
}

/**
 * Actions module for trace normalization.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Stores injected dependencies
 * - Creates ActionNormalizerService and TraceIngestionService
 * - Does NOT register the scheduled job yet
 *
 * ### run() phase:
 * - Registers the normalization job on the scheduler (when enabled)
 *
 * @example
 * ```typescript
 * const actionsModule = new ActionsModule();
 * await actionsModule.init({ logger, scheduler, pendingTraces, actions, job });
 * await actionsModule.run();
 * ```
 */
export class ActionsModule implements IModule<IActionsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'actions',
        name: 'Actions',
        version: '1.0.0',
        description: 'Normalizes classified traces into storage-ready action records'
    };

    private dependencies: IActionsModuleDependencies | null = null;
    private logger: ILogger | null = null;
    private normalizer: ActionNormalizerService | null = null;
    private ingestion: TraceIngestionService | null = null;

    async init(dependencies: IActionsModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: this.metadata.id });
        logger.info('Initializing actions module...');

        if (dependencies.job.batchSize <= 0) {
            throw new Error(`Invalid batch size for ${dependencies.job.name}: ${dependencies.job.batchSize}`);
        }

        this.dependencies = dependencies;
        this.logger = logger;
        this.normalizer = new ActionNormalizerService(logger.child({ service: 'normalizer' }));
        this.ingestion = new TraceIngestionService(
            dependencies.pendingTraces,
            dependencies.actions,
            this.normalizer,
            logger.child({ service: 'ingestion' }),
            { batchSize: dependencies.job.batchSize, writeRetry: dependencies.job.writeRetry }
        );

        logger.info('Actions module initialized');
    }

    async run(): Promise<void> {
        const { dependencies, logger } = this;
        if (!dependencies || !logger) {
            throw new Error('ActionsModule not initialized - call init() first');
        }
        const ingestion = this.getIngestionService();

        const { job, scheduler } = dependencies;
        if (!job.enabled) {
            logger.info({ jobName: job.name }, 'Normalization job disabled, not scheduling');
            return;
        }

        scheduler.register(job.name, job.schedule, async () => {
            await ingestion.runOnce();
        });
        logger.info({ jobName: job.name, schedule: job.schedule }, 'Actions module running');
    }

    getNormalizerService(): ActionNormalizerService {
        if (!this.normalizer) {
            throw new Error('ActionsModule not initialized - call init() first');
        }
        return this.normalizer;
    }

    getIngestionService(): TraceIngestionService {
        if (!this.ingestion) {
            throw new Error('ActionsModule not initialized - call init() first');
        }
        return this.ingestion;
    }
}
