import { describe, it, expect, vi, afterEach } from 'vitest'
import { ServiceRegistry } from '../../../src/service/registry.js'
import { JsonRpcKeyService } from '../../../src/service/json-rpc-service.js'
import { ConfigError } from '../../../src/errors.js'
import type { ConnectionSettings } from '../../../src/types.js'
import { createMockService } from '../../helpers/service.js'

const SETTINGS: ConnectionSettings = {
  endpoint: 'https://dns.example.test/rpc',
  credentials: { username: 'operator', password: 'test-secret' },
  timeoutMs: 1000,
}

afterEach(() => {
  ServiceRegistry.reset()
})

describe('ServiceRegistry', () => {
  it('registers the jsonrpc transport by default', async () => {
    expect(ServiceRegistry.getTransports()).toEqual(['jsonrpc'])
    const service = ServiceRegistry.create('jsonrpc', SETTINGS)
    expect(service).toBeInstanceOf(JsonRpcKeyService)
    await service.close?.()
  })

  it('creates services from registered factories', () => {
    const service = createMockService()
    const factory = vi.fn(() => service)
    ServiceRegistry.register('memory', factory)

    expect(ServiceRegistry.create('memory', SETTINGS)).toBe(service)
    expect(factory).toHaveBeenCalledWith(SETTINGS)
  })

  it('throws ConfigError listing available transports for an unknown one', () => {
    expect(() => ServiceRegistry.create('xmlrpc', SETTINGS)).toThrow(ConfigError)
    expect(() => ServiceRegistry.create('xmlrpc', SETTINGS)).toThrow(
      'Unknown transport: xmlrpc. Available transports: jsonrpc',
    )
  })

  it('drops custom transports on reset', () => {
    ServiceRegistry.register('memory', () => createMockService())
    ServiceRegistry.reset()
    expect(ServiceRegistry.getTransports()).toEqual(['jsonrpc'])
  })
})
