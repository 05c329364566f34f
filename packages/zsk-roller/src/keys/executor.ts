/**
 * Sequential application of a rollover plan against the key-management
 * service.
 */

import type { Logger } from 'pino'
import { OperationError } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { KeyManagementService, ServiceResult } from '../service/types.js'
import { describeAction } from './actions.js'
import type { Action, AppliedAction } from './types.js'

/**
 * Outcome of {@link apply}. On failure, `applied` lists the actions that
 * succeeded before the failing one; they are not rolled back.
 * @public
 */
export type ApplyResult =
  | { ok: true; value: AppliedAction[] }
  | { ok: false; error: OperationError; applied: AppliedAction[] }

/** Options for {@link apply}. */
export interface ApplyOptions {
  logger?: Logger | undefined
}

function withoutValue(result: ServiceResult<void>): ServiceResult<undefined> {
  return result.ok ? { ok: true, value: undefined } : result
}

async function dispatch(
  action: Action,
  service: KeyManagementService,
): Promise<ServiceResult<string | undefined>> {
  switch (action.kind) {
    case 'activate':
      return withoutValue(await service.activateKey(action.keyId))
    case 'create':
      return service.createKey({
        algorithm: action.algorithm,
        bits: action.bits,
        role: action.role,
        activate: action.activate,
      })
    case 'deactivate':
      return withoutValue(await service.deactivateKey(action.keyId))
    case 'delete':
      return withoutValue(await service.deleteKey(action.keyId))
  }
}

/**
 * Apply actions in order, stopping at the first one the service rejects.
 *
 * @remarks
 * A failure part-way through a rollover (say after `Activate` but before
 * `Deactivate`) leaves two active keys behind. That state is reported as
 * `multiple-active` by the next run and must be fixed by an operator.
 *
 * @public
 */
export async function apply(
  actions: readonly Action[],
  service: KeyManagementService,
  options?: ApplyOptions,
): Promise<ApplyResult> {
  const logger = options?.logger ?? silentLogger()
  const applied: AppliedAction[] = []

  for (const action of actions) {
    const description = describeAction(action)
    logger.debug({ action: description }, 'applying action')

    const result = await dispatch(action, service)
    if (!result.ok) {
      logger.error({ action: description, reason: result.reason }, 'action failed')
      return { ok: false, error: new OperationError(action, result.reason, [...applied]), applied }
    }

    if (action.kind === 'create') {
      applied.push({ action, createdKeyId: result.value })
      logger.info({ action: description, keyId: result.value }, 'key created')
    } else {
      applied.push({ action })
      logger.info({ action: description }, 'action applied')
    }
  }

  return { ok: true, value: applied }
}
