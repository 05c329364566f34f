/**
 * Error hierarchy for zsk-roller.
 *
 * Every error is fatal to the run that raised it. Nothing in the library
 * retries or repairs a half-applied rollover.
 *
 * @packageDocumentation
 */

import type { Action, AppliedAction, ValidationReason } from './keys/types.js'
import { describeAction } from './keys/actions.js'

/** Base error for all zsk-roller errors. */
export class ZskRollerError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ZskRollerError'
  }
}

/**
 * Thrown when the endpoint, credential or policy configuration is missing or
 * malformed. Raised before any collaborator call is made.
 */
export class ConfigError extends ZskRollerError {
  /**
   * Dotted path of the offending setting (e.g. `'credentials.username'`).
   */
  readonly field: string

  constructor(message: string, field: string) {
    super(message)
    this.name = 'ConfigError'
    this.field = field
  }
}

/**
 * Thrown when the key inventory could not be retrieved, or the collaborator
 * returned something that is not a key inventory.
 */
export class TransportError extends ZskRollerError {
  constructor(message: string) {
    super(message)
    this.name = 'TransportError'
  }
}

/**
 * Thrown when the fetched inventory violates the key set invariant: exactly
 * one active key, exactly one pre-published key, any number of deactivated
 * keys.
 *
 * An operator has to correct the installation by hand; the roller never
 * guesses which key should win.
 */
export class ValidationError extends ZskRollerError {
  /** Machine-readable code for the violated invariant. */
  readonly reason: ValidationReason

  constructor(reason: ValidationReason, detail?: string) {
    super(detail === undefined ? `Invalid ZSK set: ${reason}` : `Invalid ZSK set: ${reason} (${detail})`)
    this.name = 'ValidationError'
    this.reason = reason
  }
}

/**
 * Thrown when a mutating collaborator call did not succeed. Actions planned
 * after the failed one are never attempted.
 */
export class OperationError extends ZskRollerError {
  /** The action that failed. */
  readonly action: Action

  /** The failure reported by the key-management service. */
  readonly reason: string

  /**
   * Actions the service accepted before this one. They are not rolled back
   * and an operator has to reconcile them by hand.
   */
  readonly applied: readonly AppliedAction[]

  constructor(action: Action, reason: string, applied: readonly AppliedAction[] = []) {
    super(`${describeAction(action)} failed: ${reason}`)
    this.name = 'OperationError'
    this.action = action
    this.reason = reason
    this.applied = applied
  }
}
