/**
 * Universal Invocation Protocol
 *
 * The single guest → host call path. The guest passes a method name, a
 * format discriminant and a parameter buffer by offset; the host looks the
 * method up in the registry, runs it, and writes the response as
 *
 *   [0..4)   u32 LE  handler status (1 = success, 0 = failure)
 *   [4..8)   u32 LE  payload length N
 *   [8..8+N) payload bytes
 *
 * at the guest-supplied response offset. The return value is the protocol
 * status, independent of the handler's own status word.
 */

import Debug from 'debug'
import { describeCause } from '../../errors'
import { GuestMemory } from '../types'
import { HandlerResult, HostMethodRegistry } from './host-methods'
import { formatFromDiscriminant, formatName } from './serialization'

const debug = Debug('hostlink:bindings')

export enum ProtocolStatus {
  Ok = 0,
  MethodNotFound = 1,
  FormatError = 2,
  WriteError = 3
}

export const RESPONSE_HEADER_SIZE = 8

export interface InvokeCall {
  methodNamePtr: number
  methodNameLen: number
  format: number
  paramsPtr: number
  paramsLen: number
  responsePtr: number
}

const encoder = new TextEncoder()
const nameDecoder = new TextDecoder('utf-8', { fatal: true })

export function universalInvoke(
  memory: GuestMemory | undefined,
  registry: HostMethodRegistry,
  rawCall: InvokeCall
): ProtocolStatus {
  // Guest i32 arguments arrive signed; addresses and lengths are unsigned
  const call: InvokeCall = {
    methodNamePtr: rawCall.methodNamePtr >>> 0,
    methodNameLen: rawCall.methodNameLen >>> 0,
    format: rawCall.format >>> 0,
    paramsPtr: rawCall.paramsPtr >>> 0,
    paramsLen: rawCall.paramsLen >>> 0,
    responsePtr: rawCall.responsePtr >>> 0
  }
  if (!memory) {
    debug('universal_invoke called before guest memory was bound')
    return ProtocolStatus.MethodNotFound
  }

  let methodName: string
  try {
    methodName = nameDecoder.decode(memory.read(call.methodNamePtr, call.methodNameLen))
  } catch (error) {
    debug(`universal_invoke: unreadable method name: ${describeCause(error)}`)
    return ProtocolStatus.MethodNotFound
  }

  const format = formatFromDiscriminant(call.format)
  if (format === undefined) {
    debug(`universal_invoke: invalid format discriminant ${call.format} for ${methodName}`)
    return ProtocolStatus.FormatError
  }

  let params: Uint8Array
  try {
    params = memory.read(call.paramsPtr, call.paramsLen)
  } catch (error) {
    debug(`universal_invoke: unreadable parameters for ${methodName}: ${describeCause(error)}`)
    return ProtocolStatus.FormatError
  }

  const handler = registry.get(methodName)
  if (!handler) {
    debug(`universal_invoke: method not found: ${methodName}`)
    return ProtocolStatus.MethodNotFound
  }

  let result: HandlerResult
  try {
    result = handler.invoke(params, format)
  } catch (error) {
    debug(`Host method ${methodName} (${formatName(format)}) failed: ${describeCause(error)}`)
    result = { success: false, response: encoder.encode(describeCause(error)) }
  }

  const header = encodeResponse(result)
  try {
    memory.write(call.responsePtr, header.subarray(0, 4))
  } catch (error) {
    debug(`universal_invoke: failed to write status for ${methodName}: ${describeCause(error)}`)
    return ProtocolStatus.WriteError
  }
  try {
    memory.write(call.responsePtr + 4, header.subarray(4, RESPONSE_HEADER_SIZE))
  } catch (error) {
    debug(`universal_invoke: failed to write length for ${methodName}: ${describeCause(error)}`)
    return ProtocolStatus.WriteError
  }
  try {
    memory.write(call.responsePtr + RESPONSE_HEADER_SIZE, result.response)
  } catch (error) {
    debug(`universal_invoke: failed to write payload for ${methodName}: ${describeCause(error)}`)
    return ProtocolStatus.WriteError
  }

  return ProtocolStatus.Ok
}

/**
 * Serialize a handler result in the response layout (header + payload)
 */
export function encodeResponse(result: HandlerResult): Uint8Array {
  const bytes = new Uint8Array(RESPONSE_HEADER_SIZE + result.response.length)
  const view = new DataView(bytes.buffer)
  view.setUint32(0, result.success ? 1 : 0, true)
  view.setUint32(4, result.response.length, true)
  bytes.set(result.response, RESPONSE_HEADER_SIZE)
  return bytes
}

/**
 * Read a response previously written at `ptr`
 */
export function readResponse(memory: GuestMemory, ptr: number): HandlerResult {
  const header = memory.read(ptr, RESPONSE_HEADER_SIZE)
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength)
  const status = view.getUint32(0, true)
  const length = view.getUint32(4, true)
  return {
    success: status === 1,
    response: memory.read(ptr + RESPONSE_HEADER_SIZE, length)
  }
}
