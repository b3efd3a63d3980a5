import { Schema, model, type Document } from 'mongoose';
import type { ActionDetails } from '@actionindex/types';

/**
 * Plain field interface for Action documents.
 *
 * Logical times are stored as decimal strings: they exceed the 53-bit range
 * of a JavaScript number.
 */
export interface ActionFields {
  actionId: string;
  traceId: string;
  type: string;
  txHashes: string[];
  extendedTxHashes: string[];
  startLt: string;
  endLt: string;
  startUtime: number;
  endUtime: number;
  success: boolean;
  accounts: string[];
  source: string | null;
  sourceSecondary: string | null;
  destination: string | null;
  destinationSecondary: string | null;
  asset: string | null;
  assetSecondary: string | null;
  asset2: string | null;
  amount: string | null;
  value: string | null;
  opcode: number | null;
  details: ActionDetails | null;
  updatedAt: Date;
}

export interface ActionDoc extends Document, ActionFields {}

const ActionSchema = new Schema<ActionDoc>({
  actionId: { type: String, required: true, unique: true },
  traceId: { type: String, required: true, index: true },
  type: { type: String, required: true, index: true },
  txHashes: { type: [String], default: [] },
  extendedTxHashes: { type: [String], default: [] },
  startLt: { type: String, required: true },
  endLt: { type: String, required: true },
  startUtime: { type: Number, required: true },
  endUtime: { type: Number, required: true },
  success: { type: Boolean, required: true },
  accounts: { type: [String], default: [], index: true },
  source: { type: String, default: null },
  sourceSecondary: { type: String, default: null },
  destination: { type: String, default: null },
  destinationSecondary: { type: String, default: null },
  asset: { type: String, default: null },
  assetSecondary: { type: String, default: null },
  asset2: { type: String, default: null },
  amount: { type: String, default: null },
  value: { type: String, default: null },
  opcode: { type: Number, default: null },
  details: { type: Schema.Types.Mixed, default: null },
  updatedAt: { type: Date, default: Date.now }
}, { versionKey: false, timestamps: false, collection: 'actions' });

ActionSchema.index({ startUtime: -1 });

export const ActionModel = model<ActionDoc>('Action', ActionSchema);
