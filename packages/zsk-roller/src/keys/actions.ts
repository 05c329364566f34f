/**
 * Constructors and display helpers for rollover actions.
 */

import type {
  Action,
  ActivateAction,
  CreateKeyAction,
  DeactivateAction,
  DeleteAction,
  NewKeyTemplate,
} from './types.js'

export function activate(keyId: string): ActivateAction {
  return { kind: 'activate', keyId }
}

export function createKey(template: NewKeyTemplate): CreateKeyAction {
  return {
    kind: 'create',
    algorithm: template.algorithm,
    bits: template.bits,
    role: 'ZSK',
    activate: false,
  }
}

export function deactivate(keyId: string): DeactivateAction {
  return { kind: 'deactivate', keyId }
}

export function deleteKey(keyId: string): DeleteAction {
  return { kind: 'delete', keyId }
}

/**
 * Render an action in its canonical text form, e.g. `Activate(2)` or
 * `CreateKey(RSASHA256, 1024, ZSK, false)`.
 * @public
 */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'activate':
      return `Activate(${action.keyId})`
    case 'create':
      return `CreateKey(${action.algorithm}, ${String(action.bits)}, ${action.role}, ${String(action.activate)})`
    case 'deactivate':
      return `Deactivate(${action.keyId})`
    case 'delete':
      return `Delete(${action.keyId})`
  }
}
