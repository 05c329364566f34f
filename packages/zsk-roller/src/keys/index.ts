/**
 * Key classification, rollover policy and plan execution.
 */

export { classify } from './classifier.js'
export type { ClassifyResult } from './classifier.js'
export { evaluate, rolloverThreshold, DEFAULT_POLICY, DEFAULT_SAFETY_FACTOR } from './policy.js'
export { apply } from './executor.js'
export type { ApplyOptions, ApplyResult } from './executor.js'
export { activate, createKey, deactivate, deleteKey, describeAction } from './actions.js'
export type {
  KeyRecord,
  ActiveKey,
  PrePublishedKey,
  DeactivatedKey,
  ZskSet,
  ValidationReason,
  NewKeyTemplate,
  RolloverPolicy,
  Action,
  ActivateAction,
  CreateKeyAction,
  DeactivateAction,
  DeleteAction,
  AppliedAction,
} from './types.js'
