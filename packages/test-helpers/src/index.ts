/**
 * @zsk-roller/test-helpers: Test utilities for zsk-roller consumers.
 *
 * @packageDocumentation
 */

export { InMemoryKeyService } from './in-memory-key-service.js'
export type { AddKeyOptions, ServiceMethod } from './in-memory-key-service.js'
export { TestZone } from './test-zone.js'
export type { TestZoneOptions } from './test-zone.js'
