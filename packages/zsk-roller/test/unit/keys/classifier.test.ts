import { describe, it, expect } from 'vitest'
import { classify } from '../../../src/keys/classifier.js'
import { ValidationError } from '../../../src/errors.js'
import type { KeyRecord, ValidationReason } from '../../../src/keys/types.js'
import { activeKey, deactivatedKey, prepublishedKey } from '../../helpers/service.js'

function expectInvalid(records: KeyRecord[], reason: ValidationReason): void {
  const result = classify(records)
  expect(result.ok).toBe(false)
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(ValidationError)
    expect(result.error.reason).toBe(reason)
  }
}

describe('classify', () => {
  describe('valid inventories', () => {
    it('partitions one active and one pre-published key', () => {
      const result = classify([activeKey('1', 3600), prepublishedKey('2', 500)])
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.active).toEqual({ role: 'active', id: '1', createdAgoSeconds: 100_000 })
        expect(result.value.prepublished).toEqual({
          role: 'prepublished',
          id: '2',
          createdAgoSeconds: 500,
        })
        expect(result.value.deactivated).toEqual([])
        expect(result.value.maxTtl).toBe(3600)
      }
    })

    it('keeps deactivated keys in inventory order', () => {
      const result = classify([
        deactivatedKey('4', 1000),
        activeKey('1'),
        deactivatedKey('3', 50_000),
        prepublishedKey('2', 40_000),
      ])
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.deactivated.map((k) => k.id)).toEqual(['4', '3'])
        expect(result.value.deactivated[1]).toEqual({
          role: 'deactivated',
          id: '3',
          createdAgoSeconds: 250_000,
          deactivatedAt: '2026-01-01T00:00:00Z',
          deactivatedAgoSeconds: 50_000,
        })
      }
    })

    it('accepts the active key listed after the pre-published key', () => {
      const result = classify([prepublishedKey('2', 10), activeKey('1')])
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.active.id).toBe('1')
        expect(result.value.prepublished.id).toBe('2')
      }
    })

    it('takes maxTtl from the active key only', () => {
      const pre = { ...prepublishedKey('2', 10), maxTtl: 99 }
      const result = classify([activeKey('1', 300), pre])
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.maxTtl).toBe(300)
      }
    })

    it('accepts a maxTtl of zero', () => {
      const result = classify([activeKey('1', 0), prepublishedKey('2', 10)])
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.maxTtl).toBe(0)
      }
    })

    it('does not modify its input', () => {
      const records = [activeKey('1'), prepublishedKey('2', 10), deactivatedKey('3', 5)]
      const snapshot = structuredClone(records)
      classify(records)
      expect(records).toEqual(snapshot)
    })
  })

  describe('invariant violations', () => {
    it('rejects an empty inventory', () => {
      expectInvalid([], 'missing-active-or-prepublished')
    })

    it('rejects a single key', () => {
      expectInvalid([activeKey('1')], 'missing-active-or-prepublished')
    })

    it('rejects two active keys', () => {
      expectInvalid(
        [activeKey('1'), activeKey('2'), prepublishedKey('3', 10)],
        'multiple-active',
      )
    })

    it('rejects two pre-published keys', () => {
      expectInvalid(
        [activeKey('1'), prepublishedKey('2', 10), prepublishedKey('3', 20)],
        'multiple-prepublished',
      )
    })

    it('rejects an inventory with no active key', () => {
      expectInvalid([prepublishedKey('2', 10), deactivatedKey('3', 5)], 'missing-active-or-prepublished')
    })

    it('rejects an inventory with no pre-published key', () => {
      expectInvalid([activeKey('1'), deactivatedKey('3', 5)], 'missing-active-or-prepublished')
    })

    it('rejects an active key that also carries a deactivation timestamp', () => {
      const broken: KeyRecord = { ...activeKey('1'), deactivatedAt: '2026-01-01T00:00:00Z' }
      expectInvalid([broken, prepublishedKey('2', 10)], 'active-and-deactivated')
    })

    it('rejects an active key without maxTtl', () => {
      const noTtl: KeyRecord = { id: '1', activated: true, createdAgoSeconds: 1, deactivatedAgoSeconds: 0 }
      expectInvalid([noTtl, prepublishedKey('2', 10)], 'missing-max-ttl')
    })

    it('rejects a negative maxTtl', () => {
      expectInvalid([activeKey('1', -1), prepublishedKey('2', 10)], 'missing-max-ttl')
    })

    it('names the conflicting keys in the message', () => {
      const result = classify([activeKey('1'), activeKey('7'), prepublishedKey('3', 10)])
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid ZSK set: multiple-active (keys 1 and 7)')
      }
    })
  })
})
