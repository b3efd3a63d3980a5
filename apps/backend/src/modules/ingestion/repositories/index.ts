export { ActionRepository, toActionDocument } from './action.repository.js';
export type { IActionRepository } from './action.repository.js';
export { PendingTraceRepository } from './pending-trace.repository.js';
export type { IPendingTrace, IPendingTraceRepository } from './pending-trace.repository.js';
