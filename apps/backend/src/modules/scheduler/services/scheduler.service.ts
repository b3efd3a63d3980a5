/**
 * @fileoverview In-process cron scheduler for the backend's periodic jobs.
 *
 * Jobs are registered in code during module `run()` and driven by node-cron.
 * Execution state (last run, outcome, duration) is kept in memory and exposed
 * through `getStatus()` for startup and shutdown logs.
 *
 * @module modules/scheduler/services/scheduler.service
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { ILogger } from '@actionindex/types';
import { errorMessage } from '../../../lib/errors.js';

export type CronJobHandler = () => Promise<void> | void;

export type JobRunStatus = 'success' | 'failed';

/**
 * Internal representation of a scheduled job with its handler and active cron task.
 *
 * @property name - Unique job identifier (e.g., "actions:normalize")
 * @property schedule - node-cron expression
 * @property handler - Async function to execute on schedule
 * @property task - Active node-cron ScheduledTask (undefined until start())
 */
interface RegisteredJob {
    name: string;
    schedule: string;
    handler: CronJobHandler;
    task?: ScheduledTask;
    lastStartedAt: Date | null;
    lastDurationMs: number | null;
    lastStatus: JobRunStatus | null;
    lastError: string | null;
}

export interface IJobStatus {
    name: string;
    schedule: string;
    scheduled: boolean;
    running: boolean;
    lastStartedAt: Date | null;
    lastDurationMs: number | null;
    lastStatus: JobRunStatus | null;
    lastError: string | null;
}

/**
 * Cron scheduler with overlap protection.
 *
 * A job whose previous execution is still running skips its next tick. Handler
 * failures are logged and recorded; they never propagate into node-cron.
 *
 * @example
 * const scheduler = new SchedulerService(logger);
 * scheduler.register('actions:normalize', '0 * * * * *', async () => { ... });
 * scheduler.start();
 */
export class SchedulerService {
    private readonly jobs = new Map<string, RegisteredJob>();
    private readonly runningJobs = new Set<string>();
    private started = false;
    private readonly logger: ILogger;

    constructor(logger: ILogger) {
        this.logger = logger.child({ module: 'scheduler' });
    }

    /**
     * Register a new scheduled job.
     *
     * If the scheduler has already started, the job is scheduled immediately.
     *
     * @param name - Unique job identifier
     * @param schedule - node-cron expression (five fields, or six with seconds)
     * @param handler - Function to execute on schedule
     * @throws Error if the name is taken or the expression is invalid
     */
    register(name: string, schedule: string, handler: CronJobHandler): void {
        if (this.jobs.has(name)) {
            throw new Error(`Job ${name} already registered`);
        }
        if (!cron.validate(schedule)) {
            throw new Error(`Invalid cron expression for job ${name}: ${schedule}`);
        }

        const job: RegisteredJob = {
            name,
            schedule,
            handler,
            task: undefined,
            lastStartedAt: null,
            lastDurationMs: null,
            lastStatus: null,
            lastError: null
        };
        this.jobs.set(name, job);

        if (this.started) {
            this.scheduleJob(job);
        }
    }

    /**
     * Schedule every registered job.
     */
    start(): void {
        if (this.started) {
            return;
        }
        for (const job of this.jobs.values()) {
            this.scheduleJob(job);
        }
        this.started = true;
    }

    /**
     * Execute a job once, outside its schedule, with the same overlap and
     * error handling as a cron tick.
     *
     * @returns false when the job was skipped because it is already running
     * @throws Error if the job name is not registered
     */
    async trigger(name: string): Promise<boolean> {
        const job = this.jobs.get(name);
        if (!job) {
            throw new Error(`Job ${name} not registered`);
        }
        return this.execute(job);
    }

    getStatus(): IJobStatus[] {
        return Array.from(this.jobs.values()).map(job => ({
            name: job.name,
            schedule: job.schedule,
            scheduled: job.task !== undefined,
            running: this.runningJobs.has(job.name),
            lastStartedAt: job.lastStartedAt,
            lastDurationMs: job.lastDurationMs,
            lastStatus: job.lastStatus,
            lastError: job.lastError
        }));
    }

    /**
     * Stop all cron tasks.
     *
     * Called during graceful shutdown. Executions already in flight finish on
     * their own.
     */
    stop(): void {
        this.jobs.forEach(job => {
            if (job.task) {
                job.task.stop();
                job.task = undefined;
            }
        });
        this.started = false;
        this.logger.info('All scheduler jobs stopped');
    }

    private scheduleJob(job: RegisteredJob): void {
        job.task = cron.schedule(job.schedule, () => {
            void this.execute(job);
        });
        this.logger.info({ jobName: job.name, schedule: job.schedule }, `Scheduler job started: ${job.name}`);
    }

    private async execute(job: RegisteredJob): Promise<boolean> {
        if (this.runningJobs.has(job.name)) {
            this.logger.warn(
                { jobName: job.name },
                `Scheduled Job Skipped: ${job.name} - previous execution still running`
            );
            return false;
        }

        this.runningJobs.add(job.name);
        const started = Date.now();
        job.lastStartedAt = new Date(started);
        this.logger.debug({ job: job.name }, `Scheduled Job Start: ${job.name}`);

        try {
            await job.handler();
            job.lastDurationMs = Date.now() - started;
            job.lastStatus = 'success';
            job.lastError = null;
            this.logger.info(
                { job: job.name, durationMs: job.lastDurationMs, status: 'success' },
                `Scheduled Job Complete: ${job.name}`
            );
        } catch (error) {
            job.lastDurationMs = Date.now() - started;
            job.lastStatus = 'failed';
            job.lastError = errorMessage(error);
            this.logger.error(
                { job: job.name, durationMs: job.lastDurationMs, status: 'failed', error: job.lastError },
                `Scheduled Job Failed: ${job.name}`
            );
        } finally {
            this.runningJobs.delete(job.name);
        }
        return true;
    }
}
