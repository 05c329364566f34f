/**
 * Command dispatch for the zsk-roller command line.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module is loaded.
 *
 * @internal
 */

const USAGE =
  'Usage: zsk-roller <command> [options]\n\n' +
  'Commands:\n' +
  '  roll [server]     Run one rollover check and apply the actions due\n' +
  '  plan [server]     Show the actions due without applying them\n' +
  '  status [server]   Show the current key set and safety window\n' +
  '  config init|show  Create or print the configuration file\n\n' +
  'Options:\n' +
  '  -v, --verbose         Log debug output to stderr\n' +
  '  --dry-run             Compute the plan without applying it (roll)\n' +
  '  --config-dir <dir>    Directory holding config.json\n' +
  '  -h, --help            Show this help\n'

function printHelp(): void {
  process.stdout.write(USAGE)
}

/**
 * Run the command line.
 * @param argv - Arguments after the script name
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const [subcommand, ...commandArgs] = argv

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'roll': {
      const { rollCommand } = await import('./commands/roll.js')
      return rollCommand(commandArgs)
    }
    case 'plan': {
      const { planCommand } = await import('./commands/plan.js')
      return planCommand(commandArgs)
    }
    case 'status': {
      const { statusCommand } = await import('./commands/status.js')
      return statusCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}
