import { Schema, model, type Document } from 'mongoose';

export type PendingTraceStatus = 'pending' | 'processed' | 'failed';

/**
 * Plain field interface for PendingTrace documents.
 *
 * `payload` holds the classifier's wire form of the trace; it is decoded only
 * when the trace is claimed for normalization.
 */
export interface PendingTraceFields {
  traceId: string;
  payload: unknown;
  status: PendingTraceStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  processedAt: Date | null;
}

export interface PendingTraceDoc extends Document, PendingTraceFields {}

const PendingTraceSchema = new Schema<PendingTraceDoc>({
  traceId: { type: String, required: true, unique: true },
  payload: { type: Schema.Types.Mixed, required: true },
  status: { type: String, enum: ['pending', 'processed', 'failed'], default: 'pending' },
  attempts: { type: Number, default: 0 },
  lastError: { type: String, default: null },
  createdAt: { type: Date, default: Date.now },
  processedAt: { type: Date, default: null }
}, { versionKey: false, timestamps: false, collection: 'pending_traces' });

PendingTraceSchema.index({ status: 1, createdAt: 1 });

export const PendingTraceModel = model<PendingTraceDoc>('PendingTrace', PendingTraceSchema);
