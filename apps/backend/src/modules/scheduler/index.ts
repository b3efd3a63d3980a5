export { SchedulerService } from './services/scheduler.service.js';
export type { CronJobHandler, IJobStatus, JobRunStatus } from './services/scheduler.service.js';
