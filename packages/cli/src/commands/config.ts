import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { getDefaultConfigDir, loadConfig } from 'zsk-roller'
import type { RollerConfig } from 'zsk-roller'
import { formatError } from '../output.js'

const DEFAULT_CONFIG = JSON.stringify(
  {
    version: 1,
    endpoint: 'https://dns.example.net/rpc',
    transport: 'jsonrpc',
    credentials: { username: 'operator', password: 'change-me' },
    timeoutMs: 30000,
    rollover: { safetyFactor: 10, newKey: { algorithm: 'RSASHA256', bits: 1024 } },
  },
  null,
  2,
)

function redacted(config: RollerConfig): RollerConfig {
  if (config.credentials === undefined) {
    return config
  }
  return { ...config, credentials: { ...config.credentials, password: '[REDACTED]' } }
}

function parseConfigArgs(args: string[]): { subcommand: string | undefined; configDir: string } {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: { 'config-dir': { type: 'string' } },
  })
  return { subcommand: positionals[0], configDir: values['config-dir'] ?? getDefaultConfigDir() }
}

export async function configCommand(args: string[]): Promise<number> {
  let parsed: { subcommand: string | undefined; configDir: string }
  try {
    parsed = parseConfigArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
  const { subcommand, configDir } = parsed
  const configPath = path.join(configDir, 'config.json')

  switch (subcommand) {
    case 'init': {
      try {
        await fs.mkdir(configDir, { recursive: true, mode: 0o700 })
        // 'wx' fails if the file exists
        await fs.writeFile(configPath, DEFAULT_CONFIG + '\n', {
          encoding: 'utf8',
          mode: 0o600,
          flag: 'wx',
        })
        process.stdout.write(`Config created at ${configPath}\n`)
        return 0
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
          process.stderr.write(`Config already exists at ${configPath}\n`)
          return 1
        }
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    case 'show': {
      try {
        const config = await loadConfig(configDir)
        process.stdout.write(JSON.stringify(redacted(config), null, 2) + '\n')
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    default:
      process.stderr.write('Usage: zsk-roller config <init|show> [--config-dir <dir>]\n')
      return 1
  }
}
