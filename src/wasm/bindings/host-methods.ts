/**
 * Host Method Registry
 *
 * Named host functions that guests reach through `universal_invoke`.
 * A registry is an ordinary object handed to whatever dispatches guest
 * calls, so each runtime (and each test) owns its own table.
 */

import Debug from 'debug'
import { HandlerError, UnsupportedFormatError } from '../../errors'
import { formatName, SerializationFormat } from './serialization'

const debug = Debug('hostlink:bindings')

/**
 * Outcome reported by a handler. `success` travels to the guest as the
 * response status word; it is separate from the protocol return code.
 */
export interface HandlerResult {
  success: boolean
  response: Uint8Array
}

export interface HostMethodHandler {
  invoke(params: Uint8Array, format: SerializationFormat): HandlerResult
}

export type HostMethodFunction = (params: Uint8Array, format: SerializationFormat) => HandlerResult

export function handlerFromFunction(fn: HostMethodFunction): HostMethodHandler {
  return { invoke: fn }
}

export class HostMethodRegistry {
  private readonly methods: Map<string, HostMethodHandler> = new Map()

  /**
   * Register `handler` under `name` unless the name is taken.
   * An existing handler is never replaced.
   *
   * @returns true if newly registered, false on a name collision
   */
  register(name: string, handler: HostMethodHandler | HostMethodFunction): boolean {
    if (this.methods.has(name)) {
      debug(`Host method already registered: ${name}`)
      return false
    }
    this.methods.set(name, typeof handler === 'function' ? handlerFromFunction(handler) : handler)
    debug(`Registered host method: ${name}`)
    return true
  }

  /**
   * @returns true if an entry existed and was removed
   */
  unregister(name: string): boolean {
    const removed = this.methods.delete(name)
    if (removed) {
      debug(`Unregistered host method: ${name}`)
    }
    return removed
  }

  has(name: string): boolean {
    return this.methods.has(name)
  }

  get(name: string): HostMethodHandler | undefined {
    return this.methods.get(name)
  }

  names(): string[] {
    return Array.from(this.methods.keys()).sort()
  }
}

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Build a handler for JSON-encoded calls.
 *
 * Parameters arrive as `{"data": <params>}`; the value returned by `fn` is
 * JSON-encoded into the response. Any other format is rejected with an
 * UnsupportedFormatError before the payload is touched.
 */
export function jsonHandler<R>(method: string, fn: (data: unknown) => R): HostMethodHandler {
  return {
    invoke(params: Uint8Array, format: SerializationFormat): HandlerResult {
      if (format !== SerializationFormat.Json) {
        throw new UnsupportedFormatError(method, formatName(format))
      }
      let envelope: unknown
      try {
        envelope = JSON.parse(decoder.decode(params))
      } catch (error) {
        throw new HandlerError(method, `Invalid JSON parameters for ${method}`, error)
      }
      if (typeof envelope !== 'object' || envelope === null || !('data' in envelope)) {
        throw new HandlerError(method, `Parameters for ${method} must be an object with a "data" field`)
      }
      const result = fn(envelope.data)
      return { success: true, response: encoder.encode(JSON.stringify(result ?? null)) }
    }
  }
}
