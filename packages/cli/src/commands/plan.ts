import { rollCommand } from './roll.js'

/** `roll --dry-run` under its own name. */
export function planCommand(args: string[]): Promise<number> {
  return rollCommand(args, { dryRun: true, command: 'plan' })
}
