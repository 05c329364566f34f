/**
 * Key-management service abstraction.
 */

import type { ConnectionSettings } from '../types.js'
import type { KeyRecord } from '../keys/types.js'

/**
 * Outcome of a single service call. A failed call reports why in `reason`
 * rather than throwing.
 * @public
 */
export type ServiceResult<T> = { ok: true; value: T } | { ok: false; reason: string }

/**
 * Parameters for publishing a new key.
 * @public
 */
export interface CreateKeyRequest {
  /** DNSSEC algorithm mnemonic, e.g. `'RSASHA256'`. */
  algorithm: string
  bits: number
  /** Key role; the roller only ever creates zone signing keys. */
  role: 'ZSK'
  /** Whether the key is activated on creation. */
  activate: boolean
}

/**
 * Key-management service of one DNS installation.
 *
 * @remarks
 * Implementations report every failure through the `ok: false` arm of the
 * result. Calls are issued one at a time; an implementation never sees two
 * overlapping calls from the same run.
 *
 * @public
 */
export interface KeyManagementService {
  /**
   * Fetch the installation's full ZSK inventory.
   */
  getZskInfo(): Promise<ServiceResult<KeyRecord[]>>

  /**
   * Make a key the authoritative signing key.
   * @param id - Key identifier
   */
  activateKey(id: string): Promise<ServiceResult<void>>

  /**
   * Create and publish a new key.
   * @returns The new key's identifier
   */
  createKey(request: CreateKeyRequest): Promise<ServiceResult<string>>

  /**
   * Retire a key.
   * @param id - Key identifier
   */
  deactivateKey(id: string): Promise<ServiceResult<void>>

  /**
   * Remove a retired key.
   * @param id - Key identifier
   */
  deleteKey(id: string): Promise<ServiceResult<void>>

  /**
   * Release connections held by the service, if any.
   */
  close?(): Promise<void>
}

/**
 * Factory for a service bound to one installation.
 * @public
 */
export type ServiceFactory = (settings: ConnectionSettings) => KeyManagementService
