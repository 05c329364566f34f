import { describe, it, expect } from 'vitest'
import { decodeInventory, decodeKeyRecord } from '../../../src/service/wire.js'

describe('decodeKeyRecord', () => {
  it('decodes an active key with numeric id and flag', () => {
    const result = decodeKeyRecord(
      {
        id: 1,
        activated: 1,
        deactivated_at: null,
        created_ago_seconds: 90_000,
        deactivated_ago_seconds: 0,
        max_ttl: 3600,
      },
      0,
    )
    expect(result).toEqual({
      ok: true,
      value: {
        id: '1',
        activated: true,
        createdAgoSeconds: 90_000,
        deactivatedAgoSeconds: 0,
        maxTtl: 3600,
      },
    })
  })

  it('decodes a deactivated key', () => {
    const result = decodeKeyRecord(
      {
        id: 'k3',
        activated: false,
        deactivated_at: '2026-03-01 12:00:00',
        created_ago_seconds: 120_000,
        deactivated_ago_seconds: 50_000,
      },
      2,
    )
    expect(result).toEqual({
      ok: true,
      value: {
        id: 'k3',
        activated: false,
        deactivatedAt: '2026-03-01 12:00:00',
        createdAgoSeconds: 120_000,
        deactivatedAgoSeconds: 50_000,
      },
    })
  })

  it('treats an empty deactivated_at as never deactivated', () => {
    const result = decodeKeyRecord(
      { id: 2, activated: 0, deactivated_at: '', created_ago_seconds: 5 },
      1,
    )
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.deactivatedAt).toBeUndefined()
      expect(result.value.deactivatedAgoSeconds).toBe(0)
    }
  })

  it('rejects a deactivated key without its age', () => {
    const result = decodeKeyRecord(
      { id: 3, activated: 0, deactivated_at: '2026-03-01', created_ago_seconds: 5 },
      4,
    )
    expect(result).toEqual({
      ok: false,
      error: 'key[4].deactivated_ago_seconds must be a non-negative number',
    })
  })

  it('rejects a missing id', () => {
    expect(decodeKeyRecord({ activated: true, created_ago_seconds: 1 }, 0)).toEqual({
      ok: false,
      error: 'key[0].id must be a string or integer',
    })
  })

  it('rejects an activated flag that is not boolean or 0/1', () => {
    expect(decodeKeyRecord({ id: 1, activated: 'yes', created_ago_seconds: 1 }, 0)).toEqual({
      ok: false,
      error: 'key[0].activated must be a boolean or 0/1',
    })
  })

  it('rejects a negative creation age', () => {
    expect(decodeKeyRecord({ id: 1, activated: true, created_ago_seconds: -5 }, 0)).toEqual({
      ok: false,
      error: 'key[0].created_ago_seconds must be a non-negative number',
    })
  })

  it('rejects a non-numeric max_ttl', () => {
    expect(
      decodeKeyRecord({ id: 1, activated: true, created_ago_seconds: 1, max_ttl: '3600' }, 0),
    ).toEqual({ ok: false, error: 'key[0].max_ttl must be a non-negative number' })
  })

  it('rejects a non-object entry', () => {
    expect(decodeKeyRecord('key', 3)).toEqual({ ok: false, error: 'key[3] is not an object' })
  })
})

describe('decodeInventory', () => {
  it('decodes every record in order', () => {
    const result = decodeInventory([
      { id: 1, activated: true, created_ago_seconds: 10, max_ttl: 60 },
      { id: 2, activated: false, created_ago_seconds: 5 },
    ])
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.map((r) => r.id)).toEqual(['1', '2'])
    }
  })

  it('decodes an empty inventory', () => {
    expect(decodeInventory([])).toEqual({ ok: true, value: [] })
  })

  it('rejects a non-array result', () => {
    expect(decodeInventory({ keys: [] })).toEqual({ ok: false, error: 'inventory is not an array' })
  })

  it('reports the first malformed record', () => {
    expect(
      decodeInventory([
        { id: 1, activated: true, created_ago_seconds: 10 },
        { id: 2, activated: 'no', created_ago_seconds: 5 },
      ]),
    ).toEqual({ ok: false, error: 'key[1].activated must be a boolean or 0/1' })
  })
})
