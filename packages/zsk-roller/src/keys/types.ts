/**
 * Key inventory, classified key set, policy and action types.
 */

/**
 * One zone signing key as reported by the key-management service.
 * @public
 */
export interface KeyRecord {
  /** Opaque unique key identifier. */
  id: string
  /** `true` iff this key is the currently authoritative signing key. */
  activated: boolean
  /** Deactivation timestamp. Present iff the key has been explicitly deactivated. */
  deactivatedAt?: string | undefined
  /** Seconds since the key was created. */
  createdAgoSeconds: number
  /** Seconds since the key was deactivated. Only meaningful when `deactivatedAt` is set. */
  deactivatedAgoSeconds: number
  /**
   * Maximum TTL across the installation at reporting time. The service attaches
   * it to the active key; it is a property of the whole set.
   */
  maxTtl?: number | undefined
}

/** @public */
export interface ActiveKey {
  readonly role: 'active'
  readonly id: string
  readonly createdAgoSeconds: number
}

/** @public */
export interface PrePublishedKey {
  readonly role: 'prepublished'
  readonly id: string
  readonly createdAgoSeconds: number
}

/** @public */
export interface DeactivatedKey {
  readonly role: 'deactivated'
  readonly id: string
  readonly createdAgoSeconds: number
  readonly deactivatedAt: string
  readonly deactivatedAgoSeconds: number
}

/**
 * A key inventory that satisfies the set invariant: one active key, one
 * pre-published key, and any number of deactivated keys.
 * @public
 */
export interface ZskSet {
  readonly active: ActiveKey
  readonly prepublished: PrePublishedKey
  /** Deactivated keys in the order the service reported them. */
  readonly deactivated: readonly DeactivatedKey[]
  /** Maximum TTL of the installation, in seconds. */
  readonly maxTtl: number
}

/**
 * Machine-readable codes for inventories that violate the set invariant.
 * @public
 */
export type ValidationReason =
  | 'multiple-active'
  | 'multiple-prepublished'
  | 'missing-active-or-prepublished'
  | 'active-and-deactivated'
  | 'missing-max-ttl'

/**
 * Parameters of the key created to replace the promoted pre-published key.
 * @public
 */
export interface NewKeyTemplate {
  /** DNSSEC signing algorithm mnemonic, e.g. `'RSASHA256'`. */
  algorithm: string
  /** Key size in bits. */
  bits: number
}

/**
 * Rollover policy. The safety window is `safetyFactor × maxTtl` seconds.
 * @public
 */
export interface RolloverPolicy {
  /** Non-negative integer multiplier applied to the installation's max TTL. */
  safetyFactor: number
  /** Template for newly published keys. */
  newKey: NewKeyTemplate
}

/** Promote a key to authoritative. */
export interface ActivateAction {
  readonly kind: 'activate'
  readonly keyId: string
}

/** Create and publish a new key. */
export interface CreateKeyAction {
  readonly kind: 'create'
  readonly algorithm: string
  readonly bits: number
  readonly role: 'ZSK'
  /** Whether the key becomes active on creation. Rollovers always publish inactive. */
  readonly activate: boolean
}

/** Retire an active key. */
export interface DeactivateAction {
  readonly kind: 'deactivate'
  readonly keyId: string
}

/** Remove a retired key from the zone. */
export interface DeleteAction {
  readonly kind: 'delete'
  readonly keyId: string
}

/**
 * A single state transition to apply. Produced and consumed within one run.
 * @public
 */
export type Action = ActivateAction | CreateKeyAction | DeactivateAction | DeleteAction

/**
 * An action that the key-management service accepted.
 * @public
 */
export interface AppliedAction {
  action: Action
  /** Id of the key the service created. Only set for `create` actions. */
  createdKeyId?: string | undefined
}
