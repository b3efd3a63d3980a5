export { decodeTrace, WireTraceSchema } from './trace.codec.js';
export type { IDecodedTrace } from './trace.codec.js';
export { PAYLOAD_SCHEMAS } from './payload.schemas.js';
