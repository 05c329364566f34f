/**
 * Decoding of the key inventory returned by the `GetZSKInfo` call.
 *
 * Wire records use snake_case field names:
 *
 * ```json
 * {
 *   "id": 2,
 *   "activated": 0,
 *   "deactivated_at": null,
 *   "created_ago_seconds": 40000,
 *   "deactivated_ago_seconds": 0,
 *   "max_ttl": 3600
 * }
 * ```
 */

import type { KeyRecord } from '../keys/types.js'
import type { Result } from '../types.js'

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isAge(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
}

function decodeId(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') {
    return value
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return String(value)
  }
  return undefined
}

function decodeFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value
  }
  if (value === 0 || value === 1) {
    return value === 1
  }
  return undefined
}

/**
 * Decode a single wire key record.
 *
 * @param index - Position in the inventory, for error messages
 */
export function decodeKeyRecord(raw: unknown, index: number): Result<KeyRecord, string> {
  const where = `key[${String(index)}]`
  if (!isObject(raw)) {
    return { ok: false, error: `${where} is not an object` }
  }

  const id = decodeId(raw.id)
  if (id === undefined) {
    return { ok: false, error: `${where}.id must be a string or integer` }
  }

  const activated = decodeFlag(raw.activated)
  if (activated === undefined) {
    return { ok: false, error: `${where}.activated must be a boolean or 0/1` }
  }

  if (!isAge(raw.created_ago_seconds)) {
    return { ok: false, error: `${where}.created_ago_seconds must be a non-negative number` }
  }

  const record: KeyRecord = {
    id,
    activated,
    createdAgoSeconds: raw.created_ago_seconds,
    deactivatedAgoSeconds: 0,
  }

  const deactivatedAt = raw.deactivated_at
  if (deactivatedAt !== undefined && deactivatedAt !== null && deactivatedAt !== '') {
    if (typeof deactivatedAt !== 'string') {
      return { ok: false, error: `${where}.deactivated_at must be a string` }
    }
    if (!isAge(raw.deactivated_ago_seconds)) {
      return {
        ok: false,
        error: `${where}.deactivated_ago_seconds must be a non-negative number`,
      }
    }
    record.deactivatedAt = deactivatedAt
    record.deactivatedAgoSeconds = raw.deactivated_ago_seconds
  }

  if (raw.max_ttl !== undefined && raw.max_ttl !== null) {
    if (!isAge(raw.max_ttl)) {
      return { ok: false, error: `${where}.max_ttl must be a non-negative number` }
    }
    record.maxTtl = raw.max_ttl
  }

  return { ok: true, value: record }
}

/**
 * Decode a full `GetZSKInfo` result.
 */
export function decodeInventory(raw: unknown): Result<KeyRecord[], string> {
  if (!Array.isArray(raw)) {
    return { ok: false, error: 'inventory is not an array' }
  }
  const records: KeyRecord[] = []
  for (const [index, entry] of Array.from<unknown>(raw).entries()) {
    const decoded = decodeKeyRecord(entry, index)
    if (!decoded.ok) {
      return decoded
    }
    records.push(decoded.value)
  }
  return { ok: true, value: records }
}
