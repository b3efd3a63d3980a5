export { STAKING_ACTION_TYPES } from './ActionType.js';
export type { ActionType, StakingActionType } from './ActionType.js';
export type * from './IActionDetails.js';
export type { ActionFields, IAction } from './IAction.js';
