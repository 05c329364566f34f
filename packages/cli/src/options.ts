import { parseArgs } from 'node:util'
import type { RollerCommandOptions } from './types.js'

/** Commands that take the shared roller options. */
export type RollerCommandName = 'roll' | 'plan' | 'status'

const SUMMARY: Record<RollerCommandName, string> = {
  roll: 'Run one rollover check and apply the actions due',
  plan: 'Show the actions due without applying them',
  status: 'Show the current key set and safety window',
}

/** Help text for one of the roller commands. */
export function commandUsage(command: RollerCommandName): string {
  return (
    `Usage: zsk-roller ${command} [server] [options]\n\n` +
    `${SUMMARY[command]}.\n\n` +
    'Options:\n' +
    '  -v, --verbose         Log debug output to stderr\n' +
    (command === 'roll' ? '  --dry-run             Compute the plan without applying it\n' : '') +
    '  --config-dir <dir>    Directory holding config.json\n' +
    '  -h, --help            Show this help\n'
  )
}

/** Thrown for a malformed command line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Parse the arguments shared by `roll`, `plan` and `status`.
 * Unknown options are rejected.
 */
export function parseRollerArgs(args: string[]): RollerCommandOptions {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      help: { type: 'boolean', short: 'h' },
      verbose: { type: 'boolean', short: 'v' },
      'dry-run': { type: 'boolean' },
      'config-dir': { type: 'string' },
    },
  })

  const extra = positionals[1]
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument: ${extra}`)
  }

  return {
    server: positionals[0],
    help: values.help === true,
    verbose: values.verbose === true,
    dryRun: values['dry-run'] === true,
    configDir: values['config-dir'],
  }
}
