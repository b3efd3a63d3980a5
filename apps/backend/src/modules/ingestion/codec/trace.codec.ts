import { z } from 'zod';
import {
  isBlockType,
  type Block,
  type BlockDataMap,
  type BlockType,
  type IBlockEnvelope,
  type ILogger,
  type IMalformedBlock,
  type IncomingBlock
} from '@actionindex/types';
import { DecodeError } from '../../../lib/errors.js';
import { EventNodeSchema } from './event-node.schema.js';
import { PAYLOAD_SCHEMAS, type PayloadSchema } from './payload.schemas.js';
import { LtSchema } from './primitives.js';

const BlockEnvelopeSchema = z
  .object({
    btype: z.string().min(1, 'Block type must not be empty'),
    event_nodes: z.array(EventNodeSchema),
    min_lt: LtSchema,
    max_lt: LtSchema,
    min_utime: z.number().int().nonnegative(),
    max_utime: z.number().int().nonnegative(),
    failed: z.boolean().default(false),
    initiating_event_node: EventNodeSchema.nullish(),
    data: z.unknown()
  })
  .transform(block => ({
    btype: block.btype,
    data: block.data,
    eventNodes: block.event_nodes,
    minLt: block.min_lt,
    maxLt: block.max_lt,
    minUtime: block.min_utime,
    maxUtime: block.max_utime,
    failed: block.failed,
    initiatingEventNode: block.initiating_event_node ?? null
  }));

export const WireTraceSchema = z.object({
  trace_id: z.string().min(1, 'Trace id must not be empty'),
  blocks: z.array(BlockEnvelopeSchema)
});

export interface IDecodedTrace {
  traceId: string;
  blocks: IncomingBlock[];
}

function decodePayload<K extends BlockType>(
  btype: K,
  envelope: IBlockEnvelope,
  data: unknown,
  path: string
): Block<K> | IMalformedBlock {
  const schema: PayloadSchema<BlockDataMap[K]> = PAYLOAD_SCHEMAS[btype];
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { ...envelope, btype, data, malformed: true, issues: parsed.error.issues };
  }
  const block: Block<K> = { ...envelope, btype, data: parsed.data };
  return block;
}

/**
 * Decode a classified trace from its stored wire form.
 *
 * Each payload is checked on its own. A payload that does not match its
 * block type is kept as an `IMalformedBlock` with the zod issues attached, so
 * the rest of the trace still decodes. Block types this indexer does not know
 * are passed through with their raw payload; the normalizer reports them.
 *
 * @throws {DecodeError} When the trace envelope does not match the wire format
 */
export function decodeTrace(input: unknown, logger: ILogger): IDecodedTrace {
  const parsed = WireTraceSchema.safeParse(input);
  if (!parsed.success) {
    throw new DecodeError('Invalid trace envelope', parsed.error.issues);
  }

  const traceId = parsed.data.trace_id;
  const blocks = parsed.data.blocks.map((wire, index): IncomingBlock => {
    const { btype, data, ...envelope } = wire;
    if (!isBlockType(btype)) {
      return { ...envelope, btype, data };
    }
    const path = `blocks[${index}].data`;
    const block = decodePayload(btype, envelope, data, path);
    if ('malformed' in block) {
      logger.warn({ traceId, btype, path, issues: block.issues }, `Invalid ${btype} payload`);
    }
    return block;
  });

  return { traceId, blocks };
}
