import { ZskRoller, createLogger } from 'zsk-roller'
import { commandUsage, parseRollerArgs } from '../options.js'
import type { RollerCommandName } from '../options.js'
import { formatFailure, formatReport } from '../output.js'

/** Options for {@link rollCommand} that the command line cannot turn off. */
export interface RollOverrides {
  dryRun?: boolean | undefined
  /** Name shown in the usage text. */
  command?: RollerCommandName | undefined
}

export async function rollCommand(args: string[], overrides?: RollOverrides): Promise<number> {
  let roller: ZskRoller | undefined
  try {
    const options = parseRollerArgs(args)
    if (options.help) {
      process.stdout.write(commandUsage(overrides?.command ?? 'roll'))
      return 0
    }
    roller = await ZskRoller.init({
      configDir: options.configDir,
      endpoint: options.server,
      logger: createLogger({ verbose: options.verbose }),
    })
    const report = await roller.run({ dryRun: options.dryRun || overrides?.dryRun === true })
    process.stdout.write(formatReport(report))
    return 0
  } catch (err) {
    process.stderr.write(formatFailure(err))
    return 1
  } finally {
    await roller?.close()
  }
}
