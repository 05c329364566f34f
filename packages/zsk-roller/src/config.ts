/**
 * Configuration loading, validation, and defaults for zsk-roller.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError } from './errors.js'
import { DEFAULT_POLICY, DEFAULT_SAFETY_FACTOR } from './keys/policy.js'
import type { RolloverPolicy } from './keys/types.js'
import type { ConnectionSettings, Credentials, RollerConfig } from './types.js'

/** Default timeout for a single service call. */
export const DEFAULT_TIMEOUT_MS = 30_000

/** Transport used when the config does not name one. */
export const DEFAULT_TRANSPORT = 'jsonrpc'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'zsk-roller')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'zsk-roller')
  }
  return path.join(os.homedir(), '.config', 'zsk-roller')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): RollerConfig {
  return {
    version: 1,
    transport: DEFAULT_TRANSPORT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    rollover: {
      safetyFactor: DEFAULT_POLICY.safetyFactor,
      newKey: { ...DEFAULT_POLICY.newKey },
    },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Interpret a configured safety factor. Non-negative integers and strings of
 * decimal digits are accepted; anything else, including an unset value,
 * yields the default of 10.
 */
export function parseSafetyFactor(value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return value
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10)
    if (Number.isSafeInteger(parsed)) {
      return parsed
    }
  }
  return DEFAULT_SAFETY_FACTOR
}

function validateCredentials(value: unknown): Credentials {
  if (!isObject(value)) {
    throw new ConfigError('Config credentials must be an object', 'credentials')
  }
  if (typeof value.username !== 'string' || value.username.trim() === '') {
    throw new ConfigError(
      'Config credentials.username must be a non-empty string',
      'credentials.username',
    )
  }
  if (typeof value.password !== 'string') {
    throw new ConfigError('Config credentials.password must be a string', 'credentials.password')
  }
  return { username: value.username, password: value.password }
}

function validateRollover(value: unknown): RollerConfig['rollover'] {
  const fallback = defaultConfig().rollover
  if (value === undefined) {
    return fallback
  }
  if (!isObject(value)) {
    throw new ConfigError('Config rollover must be an object', 'rollover')
  }

  const result: RollerConfig['rollover'] = {
    safetyFactor: parseSafetyFactor(value.safetyFactor),
    newKey: fallback.newKey,
  }

  if (value.newKey !== undefined) {
    const { newKey } = value
    if (!isObject(newKey)) {
      throw new ConfigError('Config rollover.newKey must be an object', 'rollover.newKey')
    }
    if (typeof newKey.algorithm !== 'string' || newKey.algorithm.trim() === '') {
      throw new ConfigError(
        'Config rollover.newKey.algorithm must be a non-empty string',
        'rollover.newKey.algorithm',
      )
    }
    if (
      typeof newKey.bits !== 'number' ||
      !Number.isSafeInteger(newKey.bits) ||
      newKey.bits <= 0
    ) {
      throw new ConfigError(
        'Config rollover.newKey.bits must be a positive integer',
        'rollover.newKey.bits',
      )
    }
    result.newKey = { algorithm: newKey.algorithm, bits: newKey.bits }
  }

  return result
}

/**
 * Validate an unknown value as a RollerConfig, throwing on invalid structure.
 *
 * @throws {@link ConfigError} naming the first offending field
 */
export function validateConfig(config: unknown): RollerConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object', '')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1', 'version')
  }

  const result = defaultConfig()
  result.rollover = validateRollover(config.rollover)

  if (config.endpoint !== undefined) {
    if (typeof config.endpoint !== 'string') {
      throw new ConfigError('Config endpoint must be a string', 'endpoint')
    }
    result.endpoint = validateEndpoint(config.endpoint)
  }

  if (config.transport !== undefined) {
    if (typeof config.transport !== 'string' || config.transport.trim() === '') {
      throw new ConfigError('Config transport must be a non-empty string', 'transport')
    }
    result.transport = config.transport
  }

  if (config.credentials !== undefined) {
    result.credentials = validateCredentials(config.credentials)
  }

  if (config.caFile !== undefined) {
    if (typeof config.caFile !== 'string' || config.caFile.trim() === '') {
      throw new ConfigError('Config caFile must be a non-empty string', 'caFile')
    }
    result.caFile = config.caFile
  }

  if (config.timeoutMs !== undefined) {
    if (typeof config.timeoutMs !== 'number' || !(config.timeoutMs > 0)) {
      throw new ConfigError('Config timeoutMs must be a positive number', 'timeoutMs')
    }
    result.timeoutMs = config.timeoutMs
  }

  return result
}

/**
 * Check that an endpoint is an absolute `http:` or `https:` URL.
 *
 * @returns The endpoint unchanged
 * @throws {@link ConfigError} otherwise
 */
export function validateEndpoint(endpoint: string): string {
  let url: URL
  try {
    url = new URL(endpoint)
  } catch {
    throw new ConfigError(`Endpoint is not a valid URL: ${endpoint}`, 'endpoint')
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Endpoint must use http or https: ${endpoint}`, 'endpoint')
  }
  return endpoint
}

/**
 * Load the zsk-roller config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<RollerConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, '')
  }

  return validateConfig(parsed)
}

/**
 * Build the rollover policy described by a config.
 */
export function policyFromConfig(config: RollerConfig): RolloverPolicy {
  return {
    safetyFactor: config.rollover.safetyFactor,
    newKey: { ...config.rollover.newKey },
  }
}

/**
 * Resolve the connection settings for a run.
 *
 * @param config - Validated configuration
 * @param endpointOverride - Endpoint given on the command line, if any
 * @throws {@link ConfigError} when the endpoint or credentials are missing,
 *   or the CA bundle cannot be read
 */
export async function resolveConnection(
  config: RollerConfig,
  endpointOverride?: string,
): Promise<ConnectionSettings> {
  const endpoint = endpointOverride ?? config.endpoint
  if (endpoint === undefined || endpoint.trim() === '') {
    throw new ConfigError(
      'No service endpoint configured; pass a server or set "endpoint" in config.json',
      'endpoint',
    )
  }
  validateEndpoint(endpoint)

  if (config.credentials === undefined) {
    throw new ConfigError('No credentials configured; set "credentials" in config.json', 'credentials')
  }

  const settings: ConnectionSettings = {
    endpoint,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  }

  if (config.caFile !== undefined) {
    try {
      settings.ca = await fs.readFile(config.caFile, 'utf-8')
    } catch {
      throw new ConfigError(`Cannot read CA bundle at ${config.caFile}`, 'caFile')
    }
  }

  return settings
}
