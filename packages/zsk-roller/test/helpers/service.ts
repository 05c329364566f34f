/**
 * Shared test helpers for key records and service stand-ins.
 */

import { vi } from 'vitest'
import type { KeyRecord } from '../../src/keys/types.js'
import type { KeyManagementService, ServiceResult } from '../../src/service/types.js'

export function activeKey(id: string, maxTtl = 3600, createdAgoSeconds = 100_000): KeyRecord {
  return { id, activated: true, createdAgoSeconds, deactivatedAgoSeconds: 0, maxTtl }
}

export function prepublishedKey(id: string, createdAgoSeconds: number): KeyRecord {
  return { id, activated: false, createdAgoSeconds, deactivatedAgoSeconds: 0 }
}

export function deactivatedKey(id: string, deactivatedAgoSeconds: number): KeyRecord {
  return {
    id,
    activated: false,
    deactivatedAt: '2026-01-01T00:00:00Z',
    createdAgoSeconds: deactivatedAgoSeconds + 200_000,
    deactivatedAgoSeconds,
  }
}

function ok(): Promise<ServiceResult<void>> {
  return Promise.resolve({ ok: true, value: undefined })
}

/**
 * A `KeyManagementService` whose calls are all `vi.fn` mocks that succeed.
 * Every call is also appended to `calls` in the order it was made.
 */
export function createMockService(inventory: KeyRecord[] = []): KeyManagementService & {
  calls: string[]
} {
  const calls: string[] = []
  return {
    calls,
    getZskInfo: vi.fn(() => {
      calls.push('getZskInfo')
      return Promise.resolve<ServiceResult<KeyRecord[]>>({ ok: true, value: inventory })
    }),
    activateKey: vi.fn((id: string) => {
      calls.push(`activateKey:${id}`)
      return ok()
    }),
    createKey: vi.fn(() => {
      calls.push('createKey')
      return Promise.resolve<ServiceResult<string>>({ ok: true, value: 'new-1' })
    }),
    deactivateKey: vi.fn((id: string) => {
      calls.push(`deactivateKey:${id}`)
      return ok()
    }),
    deleteKey: vi.fn((id: string) => {
      calls.push(`deleteKey:${id}`)
      return ok()
    }),
    close: vi.fn(() => Promise.resolve()),
  }
}
