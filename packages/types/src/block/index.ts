export { BLOCK_TYPES, isBlockType } from './BlockType.js';
export type { BlockDataMap, BlockType } from './BlockType.js';
export type { Block, IBlockEnvelope, IMalformedBlock, IncomingBlock, IUnrecognizedBlock } from './IBlock.js';
export type * from './payloads/index.js';
