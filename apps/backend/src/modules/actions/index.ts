export { ActionsModule, type IActionsModuleDependencies } from './ActionsModule.js';
export { ActionNormalizerService } from './services/action-normalizer.service.js';
export { blockToAction, isMalformedBlock, isRecognizedBlock } from './block-to-action.js';
export { ActionBuilder } from './action-builder.js';
export { buildBaseAction } from './base-converter.js';
export { deriveActionId, selectRootEventNode } from './action-id.js';
export { resolveAddress } from './address.js';
export { NORMALIZERS } from './normalizers/index.js';
export type { ActionPatch, INormalizerContext, Normalizer, NormalizerTable } from './normalizers/index.js';
