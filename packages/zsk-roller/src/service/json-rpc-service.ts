/**
 * JSON-RPC 2.0 client for the DNS platform's key-management API.
 */

import { Agent, request } from 'undici'
import type { Dispatcher } from 'undici'
import type { KeyRecord } from '../keys/types.js'
import type { ConnectionSettings } from '../types.js'
import type { CreateKeyRequest, KeyManagementService, ServiceResult } from './types.js'
import { decodeInventory } from './wire.js'

/** Options for {@link JsonRpcKeyService}. */
export interface JsonRpcKeyServiceOptions {
  /**
   * Dispatcher to send requests through. When omitted the service creates
   * its own `Agent` from the connection settings and closes it in `close()`.
   */
  dispatcher?: Dispatcher | undefined
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeRpcError(error: unknown): string {
  if (isObject(error)) {
    const code = typeof error.code === 'number' ? ` (${String(error.code)})` : ''
    const message = typeof error.message === 'string' ? error.message : 'unknown error'
    return `${message}${code}`
  }
  return String(error)
}

/**
 * Key-management service reached over JSON-RPC 2.0 on HTTP(S).
 *
 * @remarks
 * Every call is a `POST` to the configured endpoint with HTTP Basic
 * credentials. Network errors, non-2xx responses, unparseable bodies and
 * JSON-RPC error objects are all reported through the failure arm.
 *
 * @public
 */
export class JsonRpcKeyService implements KeyManagementService {
  readonly #endpoint: string
  readonly #authorization: string
  readonly #dispatcher: Dispatcher
  readonly #ownsDispatcher: boolean
  #nextId = 1

  constructor(settings: ConnectionSettings, options?: JsonRpcKeyServiceOptions) {
    this.#endpoint = settings.endpoint
    const { username, password } = settings.credentials
    this.#authorization = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`

    if (options?.dispatcher !== undefined) {
      this.#dispatcher = options.dispatcher
      this.#ownsDispatcher = false
    } else {
      this.#dispatcher = new Agent({
        connect: {
          timeout: settings.timeoutMs,
          ...(settings.ca !== undefined ? { ca: settings.ca } : {}),
        },
        headersTimeout: settings.timeoutMs,
        bodyTimeout: settings.timeoutMs,
      })
      this.#ownsDispatcher = true
    }
  }

  async getZskInfo(): Promise<ServiceResult<KeyRecord[]>> {
    const outcome = await this.#call('GetZSKInfo', {})
    if (!outcome.ok) {
      return outcome
    }
    const decoded = decodeInventory(outcome.value)
    if (!decoded.ok) {
      return { ok: false, reason: `malformed GetZSKInfo response: ${decoded.error}` }
    }
    return { ok: true, value: decoded.value }
  }

  activateKey(id: string): Promise<ServiceResult<void>> {
    return this.#mutate('ActivateKey', { id })
  }

  async createKey(req: CreateKeyRequest): Promise<ServiceResult<string>> {
    const outcome = await this.#call('CreateKey', {
      algorithm: req.algorithm,
      bits: req.bits,
      role: req.role,
      activate: req.activate,
    })
    if (!outcome.ok) {
      return outcome
    }
    const id = outcome.value
    if (typeof id === 'string' && id !== '') {
      return { ok: true, value: id }
    }
    if (typeof id === 'number' && Number.isSafeInteger(id)) {
      return { ok: true, value: String(id) }
    }
    return { ok: false, reason: 'CreateKey did not return a key id' }
  }

  deactivateKey(id: string): Promise<ServiceResult<void>> {
    return this.#mutate('DeactivateKey', { id })
  }

  deleteKey(id: string): Promise<ServiceResult<void>> {
    return this.#mutate('DeleteKey', { id })
  }

  async close(): Promise<void> {
    if (this.#ownsDispatcher) {
      await this.#dispatcher.close()
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #mutate(method: string, params: Record<string, unknown>): Promise<ServiceResult<void>> {
    const outcome = await this.#call(method, params)
    if (!outcome.ok) {
      return outcome
    }
    if (outcome.value === false) {
      return { ok: false, reason: `${method} returned false` }
    }
    return { ok: true, value: undefined }
  }

  async #call(method: string, params: Record<string, unknown>): Promise<ServiceResult<unknown>> {
    const id = this.#nextId++
    const body = JSON.stringify({ jsonrpc: '2.0', id, method, params })

    let statusCode: number
    let payload: unknown
    try {
      const response = await request(this.#endpoint, {
        method: 'POST',
        dispatcher: this.#dispatcher,
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
          authorization: this.#authorization,
        },
        body,
      })
      statusCode = response.statusCode
      if (statusCode < 200 || statusCode >= 300) {
        await response.body.dump()
        return { ok: false, reason: `${method}: HTTP ${String(statusCode)}` }
      }
      const text = await response.body.text()
      payload = JSON.parse(text)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      return { ok: false, reason: `${method}: ${detail}` }
    }

    if (!isObject(payload)) {
      return { ok: false, reason: `${method}: response is not a JSON-RPC object` }
    }
    if (payload.error !== undefined && payload.error !== null) {
      return { ok: false, reason: `${method}: ${describeRpcError(payload.error)}` }
    }
    if (!('result' in payload)) {
      return { ok: false, reason: `${method}: response has no result` }
    }
    return { ok: true, value: payload.result }
  }
}
