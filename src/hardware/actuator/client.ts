/**
 * Shelly RPC Client
 * Type-safe client for switching Shelly Gen2 smart plugs via JSON-RPC
 */

import { ActuatorError, errorMessage } from '$types/errors'
import { isRecord } from '@utils/object'

import type {
  JSONValue,
  SwitchClient,
  SwitchSetResult,
  SwitchStatus,
} from './types'

export interface ShellyClientConfig {
  address: string
  timeout?: number
  auth?: {
    user: string
    password: string
  }
}

export interface RPCRequest {
  id: number
  method: string
  params?: Record<string, JSONValue>
}

/**
 * Extract the result of a JSON-RPC response body
 *
 * @throws {Error} On an RPC error object or a malformed body
 */
export function parseRpcResponse(data: unknown): unknown {
  if (!isRecord(data)) {
    throw new Error('Malformed RPC response')
  }

  const error = data.error
  if (isRecord(error)) {
    throw new Error(`RPC Error ${String(error.code)}: ${String(error.message)}`)
  }

  return data.result
}

/**
 * Read a Switch.GetStatus result
 *
 * @throws {Error} When the output field is missing
 */
export function parseSwitchStatus(result: unknown): SwitchStatus {
  if (!isRecord(result) || typeof result.output !== 'boolean') {
    throw new Error('Switch status has no output field')
  }

  const status: SwitchStatus = {
    id: typeof result.id === 'number' ? result.id : 0,
    output: result.output,
  }
  if (typeof result.apower === 'number') {
    status.apower = result.apower
  }
  return status
}

/**
 * Read a Switch.Set result
 */
export function parseSwitchSetResult(result: unknown): SwitchSetResult {
  return {
    was_on: isRecord(result) && result.was_on === true,
  }
}

export class ShellyRPCClient implements SwitchClient {
  private address: string
  private baseUrl: string
  private requestId = 1
  private timeout: number
  private authHeader?: string

  constructor(config: ShellyClientConfig) {
    this.address = config.address
    this.baseUrl = `http://${config.address}/rpc`
    this.timeout = config.timeout || 10000

    if (config.auth) {
      const credentials = Buffer.from(
        `${config.auth.user}:${config.auth.password}`,
      ).toString('base64')
      this.authHeader = `Basic ${credentials}`
    }
  }

  /**
   * Send a raw RPC request
   *
   * @throws {ActuatorError} On timeout, HTTP or RPC failure
   */
  private async sendRequest(
    method: string,
    params?: Record<string, JSONValue>,
  ): Promise<unknown> {
    const request: RPCRequest = {
      id: this.requestId++,
      method,
      params,
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await fetch(this.baseUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.authHeader ? { Authorization: this.authHeader } : {}),
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      })

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`)
      }

      const data: unknown = await response.json()
      return parseRpcResponse(data)
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ActuatorError(this.address, `Request timeout after ${this.timeout}ms`)
      }
      throw new ActuatorError(this.address, errorMessage(error))
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Switch methods
   */

  async setSwitch(id: number, on: boolean): Promise<SwitchSetResult> {
    return parseSwitchSetResult(await this.sendRequest('Switch.Set', { id, on }))
  }

  async getSwitchStatus(id: number): Promise<SwitchStatus> {
    try {
      return parseSwitchStatus(await this.sendRequest('Switch.GetStatus', { id }))
    } catch (error: unknown) {
      if (error instanceof ActuatorError) {
        throw error
      }
      throw new ActuatorError(this.address, errorMessage(error))
    }
  }
}
