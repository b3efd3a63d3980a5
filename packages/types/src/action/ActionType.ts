import type { BlockType } from '../block/index.js';

/**
 * Output types that relabel one or more block types so that equivalent
 * operations from different providers share a type.
 */
export const STAKING_ACTION_TYPES = ['stake_deposit', 'stake_withdrawal_request', 'stake_withdrawal'] as const;

export type StakingActionType = (typeof STAKING_ACTION_TYPES)[number];

/**
 * Type of a stored action. Unrecognized blocks keep their raw tag, hence the
 * open `string` member on the input side of the dispatcher.
 */
export type ActionType = BlockType | StakingActionType;
