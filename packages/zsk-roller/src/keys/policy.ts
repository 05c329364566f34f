/**
 * Rollover decision rules for a classified key set.
 */

import { activate, createKey, deactivate, deleteKey } from './actions.js'
import type { Action, RolloverPolicy, ZskSet } from './types.js'

/** Safety factor used when none is configured. */
export const DEFAULT_SAFETY_FACTOR = 10

/**
 * Default policy: a safety window of ten max TTLs, replacement keys are
 * 1024-bit RSASHA256.
 * @public
 */
export const DEFAULT_POLICY: RolloverPolicy = {
  safetyFactor: DEFAULT_SAFETY_FACTOR,
  newKey: { algorithm: 'RSASHA256', bits: 1024 },
}

/**
 * Length of the safety window in seconds: `safetyFactor × maxTtl`.
 * @public
 */
export function rolloverThreshold(set: ZskSet, policy: RolloverPolicy): number {
  return policy.safetyFactor * set.maxTtl
}

/**
 * Compute the actions due for a key set.
 *
 * A pre-published key older than the safety window is promoted: it is
 * activated, a replacement is published, and only then is the old active key
 * deactivated, so the zone is never without an active or a pre-published
 * key. Each deactivated key older than the window is deleted. Deletions
 * follow the rollover actions; a key deactivated by this plan has age 0 and
 * is never deleted in the same run.
 *
 * Ages are compared with strict `>`; a key exactly at the threshold waits.
 *
 * @returns The ordered plan. Empty when nothing is due.
 * @public
 */
export function evaluate(set: ZskSet, policy: RolloverPolicy): Action[] {
  const threshold = rolloverThreshold(set, policy)
  const actions: Action[] = []

  if (set.prepublished.createdAgoSeconds > threshold) {
    actions.push(
      activate(set.prepublished.id),
      createKey(policy.newKey),
      deactivate(set.active.id),
    )
  }

  for (const key of set.deactivated) {
    if (key.deactivatedAgoSeconds > threshold) {
      actions.push(deleteKey(key.id))
    }
  }

  return actions
}
