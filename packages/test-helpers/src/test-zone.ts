/**
 * Pre-configured ZskRoller for consumer tests.
 */

import type { RollerConfig } from 'zsk-roller'
import { ZskRoller, ServiceRegistry } from 'zsk-roller'
import { InMemoryKeyService } from './in-memory-key-service.js'

/** Default test configuration. The endpoint is never contacted. */
const TEST_CONFIG: RollerConfig = {
  version: 1,
  endpoint: 'http://127.0.0.1/rpc',
  transport: 'memory',
  credentials: { username: 'test', password: 'test-secret' },
  timeoutMs: 1000,
  rollover: { safetyFactor: 10, newKey: { algorithm: 'RSASHA256', bits: 1024 } },
}

/**
 * Options for creating a {@link TestZone}.
 * @public
 */
export interface TestZoneOptions {
  /** Override the safety factor. */
  safetyFactor?: number | undefined
  /** Maximum TTL reported by the installation, in seconds. */
  maxTtl?: number | undefined
}

/**
 * A zone with a freshly rolled key set, for consumer test workflows.
 *
 * @remarks
 * `TestZone` wraps a real `ZskRoller` resolved through the `memory`
 * transport to an {@link InMemoryKeyService}. The service starts with an
 * active key `'1'` and a pre-published key `'2'`, both of age 0.
 *
 * @example
 * ```ts
 * const zone = await TestZone.create({ maxTtl: 60 })
 * zone.advance(601)
 * const report = await zone.roller.run()
 * ```
 *
 * @public
 */
export class TestZone {
  /** The underlying ZskRoller instance. */
  readonly roller: ZskRoller

  /** The in-memory service the roller talks to. */
  readonly service: InMemoryKeyService

  private constructor(roller: ZskRoller, service: InMemoryKeyService) {
    this.roller = roller
    this.service = service
  }

  /**
   * Create a new TestZone, ready for use.
   * @public
   */
  static async create(options?: TestZoneOptions): Promise<TestZone> {
    const service = new InMemoryKeyService({ maxTtl: options?.maxTtl ?? 3600 })
    service.addKey({ activated: true })
    service.addKey()

    ServiceRegistry.register('memory', () => service)

    const config: RollerConfig = {
      ...TEST_CONFIG,
      rollover: {
        ...TEST_CONFIG.rollover,
        safetyFactor: options?.safetyFactor ?? TEST_CONFIG.rollover.safetyFactor,
      },
    }

    const roller = await ZskRoller.init({ config })
    return new TestZone(roller, service)
  }

  /**
   * Age every key by `seconds`.
   * @public
   */
  advance(seconds: number): void {
    this.service.advance(seconds)
  }
}
