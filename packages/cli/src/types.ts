/** Options parsed from the `zsk-roller roll|plan|status` command line. */
export interface RollerCommandOptions {
  /** Service endpoint overriding the configured one. */
  server?: string | undefined
  /** Print the command's usage instead of running it. */
  help: boolean
  /** Log at debug level. */
  verbose: boolean
  /** Compute the plan without applying it. */
  dryRun: boolean
  /** Directory holding `config.json`. */
  configDir?: string | undefined
}
