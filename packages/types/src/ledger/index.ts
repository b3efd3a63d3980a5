export type { IAccountId } from './IAccountId.js';
export type { IAsset } from './IAsset.js';
export type { EventNode, ILedgerTransaction, IMessageEventNode, ITickTockEventNode } from './IEventNode.js';
