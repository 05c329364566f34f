/**
 * Registry for key-management service transports.
 *
 * @remarks
 * The registry maps a transport name (the `transport` config setting) to a
 * factory that builds a service bound to one installation.
 */

import type { ConnectionSettings } from '../types.js'
import { ConfigError } from '../errors.js'
import { JsonRpcKeyService } from './json-rpc-service.js'
import type { KeyManagementService, ServiceFactory } from './types.js'

function registerDefaults(registry: Map<string, ServiceFactory>): Map<string, ServiceFactory> {
  registry.set('jsonrpc', (settings) => new JsonRpcKeyService(settings))
  return registry
}

/**
 * Registry for key-management service transports.
 *
 * Note: This class is used as a namespace for static methods.
 * @public
 */
// eslint-disable-next-line @typescript-eslint/no-extraneous-class
export class ServiceRegistry {
  private static factories = registerDefaults(new Map<string, ServiceFactory>())

  /**
   * Register a transport factory, replacing any existing one of that name.
   * @param transport - Transport name
   * @param factory - Factory function to create service instances
   */
  static register(transport: string, factory: ServiceFactory): void {
    this.factories.set(transport, factory)
  }

  /**
   * Create a service for a transport.
   * @throws {@link ConfigError} if the transport is not registered
   */
  static create(transport: string, settings: ConnectionSettings): KeyManagementService {
    const factory = this.factories.get(transport)
    if (factory === undefined) {
      throw new ConfigError(
        `Unknown transport: ${transport}. ` +
          `Available transports: ${this.getTransports().join(', ')}`,
        'transport',
      )
    }
    return factory(settings)
  }

  /**
   * Get all registered transport names.
   */
  static getTransports(): string[] {
    return Array.from(this.factories.keys())
  }

  /**
   * Restore the registry to the built-in transports.
   * Intended for use in tests only.
   * @internal
   */
  static reset(): void {
    this.factories = registerDefaults(new Map<string, ServiceFactory>())
  }
}
