/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { OperationError, describeAction } from 'zsk-roller'
import type { AppliedAction, RolloverPlan, RolloverPolicy, RolloverReport } from 'zsk-roller'

const LABEL_WIDTH = 19

function field(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}\n`
}

function describeApplied(applied: AppliedAction): string {
  const text = describeAction(applied.action)
  return applied.createdKeyId === undefined ? text : `${text} -> key ${applied.createdKeyId}`
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Describe what a run did, or would do on a dry run. */
export function formatReport(report: RolloverReport): string {
  if (report.actions.length === 0) {
    return 'No rollover actions due.\n'
  }
  if (report.dryRun) {
    return (
      'Planned actions (dry run):\n' +
      report.actions.map((action) => `  ${describeAction(action)}\n`).join('')
    )
  }
  return report.applied.map((applied) => `Applied ${describeApplied(applied)}\n`).join('')
}

/**
 * Format a failed run for stderr. When actions were applied before the
 * failure they are listed, since they stay in place.
 */
export function formatFailure(err: unknown): string {
  const message = `${formatError(err)}\n`
  if (!(err instanceof OperationError) || err.applied.length === 0) {
    return message
  }
  return (
    message +
    'Applied before the failure:\n' +
    err.applied.map((applied) => `  ${describeApplied(applied)}\n`).join('')
  )
}

/** Describe a classified key set and the actions due for it. */
export function formatStatus(plan: RolloverPlan, policy: RolloverPolicy): string {
  const { set } = plan
  const deactivated =
    set.deactivated.length === 0
      ? ['none']
      : set.deactivated.map((key) => `${key.id} (deactivated ${String(key.deactivatedAgoSeconds)}s ago)`)
  const [first = 'none', ...rest] = deactivated

  return (
    field('Active key', `${set.active.id} (age ${String(set.active.createdAgoSeconds)}s)`) +
    field(
      'Pre-published key',
      `${set.prepublished.id} (age ${String(set.prepublished.createdAgoSeconds)}s)`,
    ) +
    field('Deactivated keys', first) +
    rest.map((line) => `${' '.repeat(LABEL_WIDTH)}${line}\n`).join('') +
    field('Max TTL', `${String(set.maxTtl)}s`) +
    field('Safety window', `${String(plan.threshold)}s (factor ${String(policy.safetyFactor)})`) +
    field('Actions due', plan.actions.length === 0 ? 'none' : plan.actions.map(describeAction).join(', '))
  )
}
