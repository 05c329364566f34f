/**
 * Partition a raw key inventory into active, pre-published and deactivated
 * keys, enforcing the set invariant.
 */

import { ValidationError } from '../errors.js'
import type { Result } from '../types.js'
import type {
  ActiveKey,
  DeactivatedKey,
  KeyRecord,
  PrePublishedKey,
  ZskSet,
} from './types.js'

/** @public */
export type ClassifyResult = Result<ZskSet, ValidationError>

function invalid(reason: ValidationError['reason'], detail?: string): ClassifyResult {
  return { ok: false, error: new ValidationError(reason, detail) }
}

/**
 * Classify a key inventory.
 *
 * Pure: the input is not modified and nothing outside it is read.
 *
 * @param records - The full inventory reported by the key-management service
 * @returns The classified set, or the first invariant violation found
 * @public
 */
export function classify(records: readonly KeyRecord[]): ClassifyResult {
  if (records.length < 2) {
    return invalid(
      'missing-active-or-prepublished',
      `inventory has ${String(records.length)} key(s)`,
    )
  }

  let active: KeyRecord | undefined
  let prepublished: KeyRecord | undefined
  const deactivated: DeactivatedKey[] = []

  for (const record of records) {
    const { deactivatedAt } = record
    if (record.activated) {
      if (deactivatedAt !== undefined) {
        return invalid('active-and-deactivated', `key ${record.id}`)
      }
      if (active !== undefined) {
        return invalid('multiple-active', `keys ${active.id} and ${record.id}`)
      }
      active = record
    } else if (deactivatedAt === undefined) {
      if (prepublished !== undefined) {
        return invalid('multiple-prepublished', `keys ${prepublished.id} and ${record.id}`)
      }
      prepublished = record
    } else {
      deactivated.push({
        role: 'deactivated',
        id: record.id,
        createdAgoSeconds: record.createdAgoSeconds,
        deactivatedAt,
        deactivatedAgoSeconds: record.deactivatedAgoSeconds,
      })
    }
  }

  if (active === undefined || prepublished === undefined) {
    return invalid(
      'missing-active-or-prepublished',
      active === undefined ? 'no active key' : 'no pre-published key',
    )
  }

  const { maxTtl } = active
  if (maxTtl === undefined || !Number.isFinite(maxTtl) || maxTtl < 0) {
    return invalid('missing-max-ttl', `active key ${active.id}`)
  }

  const activeKey: ActiveKey = {
    role: 'active',
    id: active.id,
    createdAgoSeconds: active.createdAgoSeconds,
  }
  const prepublishedKey: PrePublishedKey = {
    role: 'prepublished',
    id: prepublished.id,
    createdAgoSeconds: prepublished.createdAgoSeconds,
  }

  return {
    ok: true,
    value: { active: activeKey, prepublished: prepublishedKey, deactivated, maxTtl },
  }
}
