import { ZskRoller, createLogger } from 'zsk-roller'
import { commandUsage, parseRollerArgs } from '../options.js'
import { formatError, formatStatus } from '../output.js'

export async function statusCommand(args: string[]): Promise<number> {
  let roller: ZskRoller | undefined
  try {
    const options = parseRollerArgs(args)
    if (options.help) {
      process.stdout.write(commandUsage('status'))
      return 0
    }
    roller = await ZskRoller.init({
      configDir: options.configDir,
      endpoint: options.server,
      logger: createLogger({ verbose: options.verbose }),
    })
    const plan = await roller.plan()
    process.stdout.write(formatStatus(plan, roller.policy))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  } finally {
    await roller?.close()
  }
}
