/**
 * Shared public types for zsk-roller.
 */

/**
 * Outcome of an operation that can fail in a known way. Callers handle both
 * arms; the failure arm carries a typed error instead of throwing it.
 * @public
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

/**
 * HTTP Basic credentials for the key-management service.
 * @public
 */
export interface Credentials {
  username: string
  password: string
}

/**
 * Settings needed to reach one DNS installation's key-management service.
 * Passed explicitly to the service constructor; nothing is read from the
 * process environment.
 * @public
 */
export interface ConnectionSettings {
  /** Service URL (`http:` or `https:`). */
  endpoint: string
  credentials: Credentials
  /** PEM bundle used to verify the service's TLS certificate. */
  ca?: string | undefined
  /** Connect, header and body timeout in milliseconds. */
  timeoutMs: number
}

/**
 * On-disk configuration (`config.json`).
 * @public
 */
export interface RollerConfig {
  version: 1
  /** Service URL. Overridden by an endpoint given on the command line. */
  endpoint?: string | undefined
  /** Registered service transport. Defaults to `'jsonrpc'`. */
  transport: string
  credentials?: Credentials | undefined
  /** Path to a PEM CA bundle for the service's TLS certificate. */
  caFile?: string | undefined
  timeoutMs: number
  rollover: {
    safetyFactor: number
    newKey: {
      algorithm: string
      bits: number
    }
  }
}
