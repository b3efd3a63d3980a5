export { TraceIngestionService } from './services/trace-ingestion.service.js';
export type { IIngestionRunResult, ITraceIngestionOptions } from './services/trace-ingestion.service.js';
export { decodeTrace } from './codec/index.js';
export type { IDecodedTrace } from './codec/index.js';
export { ActionRepository, PendingTraceRepository } from './repositories/index.js';
export type { IActionRepository, IPendingTrace, IPendingTraceRepository } from './repositories/index.js';
