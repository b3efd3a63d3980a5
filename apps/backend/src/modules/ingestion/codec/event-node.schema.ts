import { z } from 'zod';
import type { EventNode, ILedgerTransaction } from '@actionindex/types';
import { LtSchema, RawAddressSchema } from './primitives.js';

export const LedgerTransactionSchema: z.ZodType<ILedgerTransaction, z.ZodTypeDef, unknown> = z
  .object({
    hash: z.string().min(1, 'Transaction hash must not be empty'),
    account: RawAddressSchema,
    lt: LtSchema,
    now: z.number().int().nonnegative()
  })
  .transform(({ hash, account, lt, now }) => ({ hash, account, lt, utime: now }));

const MessageNodeSchema = z.object({
  lt: LtSchema,
  message: z.object({
    msg_hash: z.string().min(1, 'Message hash must not be empty'),
    transaction: LedgerTransactionSchema.nullable()
  })
});

const TickTockNodeSchema = z.object({
  lt: LtSchema,
  tick_tock_tx: LedgerTransactionSchema
});

/**
 * An event node carries either the inbound message that triggered a
 * transaction or, for tick-tock transactions, the transaction itself.
 */
export const EventNodeSchema: z.ZodType<EventNode, z.ZodTypeDef, unknown> = z
  .union([MessageNodeSchema, TickTockNodeSchema])
  .transform((node): EventNode => {
    if ('message' in node) {
      return {
        kind: 'message',
        lt: node.lt,
        message: { msgHash: node.message.msg_hash, transaction: node.message.transaction }
      };
    }
    return { kind: 'tick_tock', lt: node.lt, transaction: node.tick_tock_tx };
  });
