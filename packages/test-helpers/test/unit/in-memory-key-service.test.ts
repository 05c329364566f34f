import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryKeyService } from '../../src/index.js'

const REQUEST = { algorithm: 'RSASHA256', bits: 1024, role: 'ZSK', activate: false } as const

describe('InMemoryKeyService', () => {
  let service: InMemoryKeyService

  beforeEach(() => {
    service = new InMemoryKeyService()
  })

  it('reports keys in insertion order with the max TTL on the active key', async () => {
    service.addKey({ activated: true })
    service.addKey({ ageSeconds: 50 })

    expect(await service.getZskInfo()).toEqual({
      ok: true,
      value: [
        { id: '1', activated: true, createdAgoSeconds: 0, deactivatedAgoSeconds: 0, maxTtl: 3600 },
        { id: '2', activated: false, createdAgoSeconds: 50, deactivatedAgoSeconds: 0 },
      ],
    })
  })

  it('ages keys as the clock advances', async () => {
    service.addKey({ activated: true })
    service.advance(100)
    expect(await service.deactivateKey('1')).toEqual({ ok: true, value: undefined })
    service.advance(30)

    expect(service.inventory()).toEqual([
      {
        id: '1',
        activated: false,
        deactivatedAt: '2026-01-01T00:01:40.000Z',
        createdAgoSeconds: 130,
        deactivatedAgoSeconds: 30,
      },
    ])
  })

  it('creates keys with the next free id', async () => {
    service.addKey({ id: '17' })
    expect(await service.createKey(REQUEST)).toEqual({ ok: true, value: '18' })
    expect(service.size).toBe(2)
  })

  it('creates an activated key when asked to', async () => {
    await service.createKey({ ...REQUEST, activate: true })
    expect(service.inventory()[0]?.activated).toBe(true)
  })

  it('activates without deactivating the current key', async () => {
    service.addKey({ activated: true })
    service.addKey()
    await service.activateKey('2')
    expect(service.inventory().map((k) => k.activated)).toEqual([true, true])
  })

  it('deletes keys', async () => {
    service.addKey({ deactivatedAgoSeconds: 10 })
    expect(await service.deleteKey('1')).toEqual({ ok: true, value: undefined })
    expect(service.size).toBe(0)
  })

  it('reports unknown keys', async () => {
    expect(await service.deleteKey('9')).toEqual({ ok: false, reason: 'unknown key: 9' })
    expect(await service.activateKey('9')).toEqual({ ok: false, reason: 'unknown key: 9' })
  })

  it('injects failures until cleared', async () => {
    service.failOn('createKey', 'quota exceeded')
    expect(await service.createKey(REQUEST)).toEqual({ ok: false, reason: 'quota exceeded' })
    expect(service.size).toBe(0)

    service.clearFailures()
    expect(await service.createKey(REQUEST)).toEqual({ ok: true, value: '1' })
  })

  it('omits the max TTL when unset', () => {
    service.addKey({ activated: true })
    service.setMaxTtl(undefined)
    expect(service.inventory()[0]?.maxTtl).toBeUndefined()
  })

  it('logs every call in order', async () => {
    service.addKey({ activated: true })
    await service.getZskInfo()
    await service.activateKey('1')
    await service.createKey(REQUEST)
    await service.deactivateKey('1')
    await service.deleteKey('1')

    expect(service.calls).toEqual([
      'getZskInfo',
      'activateKey:1',
      'createKey',
      'deactivateKey:1',
      'deleteKey:1',
    ])
  })

  it('records close', async () => {
    expect(service.closed).toBe(false)
    await service.close()
    expect(service.closed).toBe(true)
  })
})
