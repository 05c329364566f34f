/**
 * In-memory key-management service for testing.
 */

import type { CreateKeyRequest, KeyManagementService, KeyRecord, ServiceResult } from 'zsk-roller'

/** Wall-clock origin for the service's simulated clock. */
const EPOCH_MS = Date.UTC(2026, 0, 1)

/**
 * Names of the service calls whose failure can be injected.
 * @public
 */
export type ServiceMethod = 'getZskInfo' | 'activateKey' | 'createKey' | 'deactivateKey' | 'deleteKey'

/**
 * Initial state of a key added with {@link InMemoryKeyService.addKey}.
 * @public
 */
export interface AddKeyOptions {
  /** Key identifier. Defaults to the next free numeric id. */
  id?: string | undefined
  activated?: boolean | undefined
  /** Seconds since creation, relative to the current simulated time. */
  ageSeconds?: number | undefined
  /** Mark the key deactivated this many seconds ago. */
  deactivatedAgoSeconds?: number | undefined
}

interface StoredKey {
  id: string
  activated: boolean
  createdAt: number
  deactivatedAt?: number | undefined
}

/**
 * A fully in-memory `KeyManagementService` for testing.
 *
 * @remarks
 * Keys live in insertion order in a plain array and age against a simulated
 * clock that only moves when {@link InMemoryKeyService.advance} is called.
 * Like a real installation, it does not enforce the key set invariant:
 * activating a second key leaves two active keys.
 *
 * @public
 */
export class InMemoryKeyService implements KeyManagementService {
  /** Every call made, in order, e.g. `'activateKey:2'`. */
  readonly calls: string[] = []

  readonly #keys: StoredKey[] = []
  readonly #failures = new Map<ServiceMethod, string>()
  #now = 0
  #nextId = 1
  #maxTtl: number | undefined
  #closed = false

  constructor(options?: { maxTtl?: number | undefined }) {
    this.#maxTtl = options?.maxTtl ?? 3600
  }

  /** @public */
  getZskInfo(): Promise<ServiceResult<KeyRecord[]>> {
    this.calls.push('getZskInfo')
    const failure = this.#failure('getZskInfo')
    if (failure !== undefined) return Promise.resolve(failure)
    return Promise.resolve({ ok: true, value: this.inventory() })
  }

  /** @public */
  activateKey(id: string): Promise<ServiceResult<void>> {
    this.calls.push(`activateKey:${id}`)
    return Promise.resolve(
      this.#update('activateKey', id, (key) => {
        key.activated = true
      }),
    )
  }

  /** @public */
  createKey(request: CreateKeyRequest): Promise<ServiceResult<string>> {
    this.calls.push('createKey')
    const failure = this.#failure('createKey')
    if (failure !== undefined) return Promise.resolve(failure)
    const id = this.addKey({ activated: request.activate })
    return Promise.resolve({ ok: true, value: id })
  }

  /** @public */
  deactivateKey(id: string): Promise<ServiceResult<void>> {
    this.calls.push(`deactivateKey:${id}`)
    return Promise.resolve(
      this.#update('deactivateKey', id, (key) => {
        key.activated = false
        key.deactivatedAt = this.#now
      }),
    )
  }

  /** @public */
  deleteKey(id: string): Promise<ServiceResult<void>> {
    this.calls.push(`deleteKey:${id}`)
    return Promise.resolve(
      this.#update('deleteKey', id, (key) => {
        this.#keys.splice(this.#keys.indexOf(key), 1)
      }),
    )
  }

  /** @public */
  close(): Promise<void> {
    this.#closed = true
    return Promise.resolve()
  }

  /**
   * Add a key directly, bypassing the call log.
   * @returns The key's identifier
   * @public
   */
  addKey(options?: AddKeyOptions): string {
    const id = options?.id ?? String(this.#nextId)
    const numeric = Number(id)
    if (Number.isSafeInteger(numeric) && numeric >= this.#nextId) {
      this.#nextId = numeric + 1
    }
    const key: StoredKey = {
      id,
      activated: options?.activated ?? false,
      createdAt: this.#now - (options?.ageSeconds ?? 0),
    }
    if (options?.deactivatedAgoSeconds !== undefined) {
      key.deactivatedAt = this.#now - options.deactivatedAgoSeconds
    }
    this.#keys.push(key)
    return id
  }

  /**
   * The inventory as `getZskInfo` would report it at the current simulated
   * time. The maximum TTL is attached to every active key.
   * @public
   */
  inventory(): KeyRecord[] {
    return this.#keys.map((key) => {
      const record: KeyRecord = {
        id: key.id,
        activated: key.activated,
        createdAgoSeconds: this.#now - key.createdAt,
        deactivatedAgoSeconds: key.deactivatedAt === undefined ? 0 : this.#now - key.deactivatedAt,
      }
      if (key.deactivatedAt !== undefined) {
        record.deactivatedAt = new Date(EPOCH_MS + key.deactivatedAt * 1000).toISOString()
      }
      if (key.activated) {
        record.maxTtl = this.#maxTtl
      }
      return record
    })
  }

  /**
   * Move the simulated clock forward.
   * @public
   */
  advance(seconds: number): void {
    this.#now += seconds
  }

  /**
   * Change the maximum TTL reported with the active key. `undefined` omits it.
   * @public
   */
  setMaxTtl(maxTtl: number | undefined): void {
    this.#maxTtl = maxTtl
  }

  /**
   * Make every subsequent call to `method` fail with `reason` until
   * {@link InMemoryKeyService.clearFailures} is called.
   * @public
   */
  failOn(method: ServiceMethod, reason: string): void {
    this.#failures.set(method, reason)
  }

  /** @public */
  clearFailures(): void {
    this.#failures.clear()
  }

  /**
   * Whether `close()` has been called.
   * @public
   */
  get closed(): boolean {
    return this.#closed
  }

  /**
   * The number of keys currently held.
   * @public
   */
  get size(): number {
    return this.#keys.length
  }

  #failure(method: ServiceMethod): { ok: false; reason: string } | undefined {
    const reason = this.#failures.get(method)
    return reason === undefined ? undefined : { ok: false, reason }
  }

  #update(
    method: ServiceMethod,
    id: string,
    change: (key: StoredKey) => void,
  ): ServiceResult<void> {
    const failure = this.#failure(method)
    if (failure !== undefined) return failure
    const key = this.#keys.find((k) => k.id === id)
    if (key === undefined) {
      return { ok: false, reason: `unknown key: ${id}` }
    }
    change(key)
    return { ok: true, value: undefined }
  }
}
