/**
 * Entry Gate
 *
 * Host-initiated calls into guest exports. Only functions listed for the
 * module in the configuration may be called, and only with one of the two
 * supported shapes: `() -> i32` returning a pointer to a NUL-terminated
 * UTF-8 string, or `() -> ()`.
 */

import Debug from 'debug'
import {
  AuthorizationError,
  ExportNotCallableError,
  ExportNotFoundError,
  GuestTrapError,
  ProtocolError,
  SignatureMismatchError
} from '../errors'
import { InstanceCache, InstanceHandle } from './instance-cache'
import { decodeUtf8, readCString } from './memory'
import { FunctionSignature, GuestValue } from './types'
import { formatSignature } from './wasm-binary'

const debug = Debug('hostlink:gate')

/**
 * `fresh` builds a new instance for every call (reusing the compiled
 * module while the file is unchanged); `reuse` keeps calling the cached one
 */
export type InstancePolicy = 'fresh' | 'reuse'

export const DEFAULT_INSTANCE_POLICY: InstancePolicy = 'fresh'

export interface EntryGateOptions {
  instancePolicy?: InstancePolicy
}

export type EntryCallResult =
  | { kind: 'string'; pointer: number; value: string }
  | { kind: 'void' }

/** Where the gate looks up permitted functions */
export interface EntryFunctionSource {
  getEntryFunctionsForFile(modulePath: string): string[]
}

type EntryShape = 'string' | 'void'

function entryShape(signature: FunctionSignature): EntryShape | undefined {
  if (signature.params.length !== 0) {
    return undefined
  }
  if (signature.results.length === 0) {
    return 'void'
  }
  if (signature.results.length === 1 && signature.results[0] === 'i32') {
    return 'string'
  }
  return undefined
}

export class EntryGate {
  readonly instancePolicy: InstancePolicy

  constructor(
    private readonly cache: InstanceCache,
    private readonly config: EntryFunctionSource,
    options: EntryGateOptions = {}
  ) {
    this.instancePolicy = options.instancePolicy ?? DEFAULT_INSTANCE_POLICY
  }

  /**
   * Call `funcName` in the guest at `modulePath` if the configuration
   * permits it.
   */
  async callEntry(modulePath: string, funcName: string): Promise<EntryCallResult> {
    const allowed = this.config.getEntryFunctionsForFile(modulePath)
    if (!allowed.includes(funcName)) {
      debug(`Rejected call to ${funcName} in ${modulePath}`)
      throw new AuthorizationError(modulePath, funcName, allowed)
    }

    const handle =
      this.instancePolicy === 'fresh'
        ? await this.cache.refresh(modulePath)
        : await this.cache.getOrLoad(modulePath)

    return invokeEntry(handle, modulePath, funcName)
  }
}

/**
 * Call an entry export on an already obtained instance. No allowlist
 * check happens here.
 */
export function invokeEntry(handle: InstanceHandle, modulePath: string, funcName: string): EntryCallResult {
  const { instance } = handle
  const descriptor = instance.describeExport(funcName)
  if (!descriptor) {
    throw new ExportNotFoundError(modulePath, funcName)
  }
  if (descriptor.kind !== 'function') {
    throw new ExportNotCallableError(modulePath, funcName, descriptor.kind)
  }
  const shape = descriptor.signature ? entryShape(descriptor.signature) : undefined
  if (!shape) {
    const signature = descriptor.signature ? formatSignature(descriptor.signature) : '<unknown>'
    throw new SignatureMismatchError(modulePath, funcName, signature)
  }

  debug(`Calling ${funcName} in ${modulePath} (generation ${handle.generation})`)
  let result: GuestValue | undefined
  try {
    result = instance.callExport(funcName, [])
  } catch (error) {
    throw new GuestTrapError(modulePath, funcName, error)
  }

  if (shape === 'void') {
    return { kind: 'void' }
  }

  if (typeof result !== 'number') {
    throw new ProtocolError(`Function '${funcName}' in '${modulePath}' did not return an i32 pointer`)
  }
  if (!instance.memory) {
    throw new ProtocolError(`Guest module '${modulePath}' exports no memory to read the result from`)
  }
  // i32 results arrive signed; pointers are unsigned offsets
  const pointer = result >>> 0
  const value = decodeUtf8(readCString(instance.memory, pointer), `String returned by '${funcName}'`)
  return { kind: 'string', pointer, value }
}
