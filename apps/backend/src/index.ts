/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Startup order: database → module init → module run → scheduler start. Every
 * module completes init() before any starts run(); a failure in either phase
 * logs the error with the failing module's metadata and exits.
 *
 * @module index
 */

import { env } from './config/env.js';
import { normalizerConfig } from './config/normalizer.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { ModuleLifecycleError, runModulePhase } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { ActionsModule, type IActionsModuleDependencies } from './modules/actions/index.js';
import { ActionRepository, PendingTraceRepository } from './modules/ingestion/index.js';
import { SchedulerService } from './modules/scheduler/index.js';

/**
 * Shared context passed from init phase to run phase.
 */
interface BootstrapContext {
    scheduler: SchedulerService;
    modules: {
        actions: ActionsModule;
    };
}

async function bootstrapInit(): Promise<BootstrapContext> {
    await connectDatabase(env.MONGODB_URI, logger.child({ module: 'database' }));

    const scheduler = new SchedulerService(logger);

    const actionsModule = new ActionsModule();
    const dependencies: IActionsModuleDependencies = {
        logger,
        scheduler,
        pendingTraces: new PendingTraceRepository(normalizerConfig.maxAttempts),
        actions: new ActionRepository(),
        job: {
            name: normalizerConfig.jobName,
            schedule: normalizerConfig.schedule,
            enabled: normalizerConfig.enabled,
            batchSize: normalizerConfig.batchSize,
            writeRetry: normalizerConfig.writeRetry
        }
    };
    await runModulePhase(actionsModule.metadata, 'init', () => actionsModule.init(dependencies));

    return { scheduler, modules: { actions: actionsModule } };
}

async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    const { actions } = ctx.modules;
    await runModulePhase(actions.metadata, 'run', () => actions.run());
    ctx.scheduler.start();
    logger.info({ jobs: ctx.scheduler.getStatus().map(job => job.name) }, 'All modules initialized');
}

/**
 * Main application entry point.
 *
 * Registers SIGINT/SIGTERM handlers that stop the scheduler and close the
 * database connection.
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        const shutdown = async (signal: NodeJS.Signals) => {
            logger.info({ signal }, `Received ${signal}, shutting down`);
            ctx.scheduler.stop();
            try {
                await disconnectDatabase();
                process.exit(0);
            } catch (error) {
                logger.error({ error }, 'Failed to close database connection');
                process.exit(1);
            }
        };

        process.once('SIGINT', signal => void shutdown(signal));
        process.once('SIGTERM', signal => void shutdown(signal));
    } catch (error) {
        if (error instanceof ModuleLifecycleError) {
            logger.error({ error: error.reason, module: error.module, phase: error.phase }, 'Failed to bootstrap application');
        } else {
            logger.error({ error }, 'Failed to bootstrap application');
        }
        process.exit(1);
    }
}

void bootstrap();
