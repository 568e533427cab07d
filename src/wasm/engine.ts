/**
 * WebAssembly Engine
 *
 * Default GuestEngine backed by the platform WebAssembly API, with
 * Node's WASI preview1 imports wired next to the host imports.
 */

import { WASI } from 'node:wasi'
import Debug from 'debug'
import { CompileError, describeCause, InstantiationError } from '../errors'
import { LinearMemory } from './memory'
import {
  CompiledGuest,
  ExportDescriptor,
  GuestEngine,
  GuestInstance,
  GuestMemory,
  GuestValue,
  HostImportObject,
  InstantiateHooks
} from './types'
import { detectWasmFormat, inspectModule } from './wasm-binary'

const debug = Debug('hostlink:engine')

export interface WebAssemblyEngineOptions {
  /** Provide wasi_snapshot_preview1 imports (default true) */
  wasi?: boolean
  env?: Record<string, string>
  /** Guest path → host directory */
  preopens?: Record<string, string>
}

class WasmCompiledGuest implements CompiledGuest {
  constructor(
    readonly module: WebAssembly.Module,
    readonly exports: ReadonlyArray<ExportDescriptor>
  ) {}
}

class WasmGuestInstance implements GuestInstance {
  readonly memory: GuestMemory | undefined
  private readonly descriptors: Map<string, ExportDescriptor>

  constructor(
    private readonly instance: WebAssembly.Instance,
    exports: ReadonlyArray<ExportDescriptor>
  ) {
    const memory = instance.exports.memory
    this.memory = memory instanceof WebAssembly.Memory ? new LinearMemory(memory) : undefined
    this.descriptors = new Map(exports.map((e) => [e.name, e]))
  }

  describeExport(name: string): ExportDescriptor | undefined {
    return this.descriptors.get(name)
  }

  callExport(name: string, args: GuestValue[]): GuestValue | undefined {
    const fn = this.instance.exports[name]
    if (typeof fn !== 'function') {
      throw new TypeError(`Export '${name}' is not a function`)
    }
    const result: unknown = fn(...args)
    if (result === undefined || typeof result === 'number' || typeof result === 'bigint') {
      return result
    }
    throw new TypeError(`Export '${name}' returned an unsupported value (${typeof result})`)
  }

  hasFunction(name: string): boolean {
    return typeof this.instance.exports[name] === 'function'
  }

  get raw(): WebAssembly.Instance {
    return this.instance
  }
}

export class WebAssemblyEngine implements GuestEngine {
  constructor(private readonly options: WebAssemblyEngineOptions = {}) {}

  async compile(bytes: Uint8Array, path: string): Promise<CompiledGuest> {
    const format = detectWasmFormat(bytes)
    debug(`Detected WASM format for ${path}: ${format}`)
    if (format === 'component') {
      throw new CompileError(path, 'component model binaries are not supported')
    }

    let module: WebAssembly.Module
    try {
      module = await WebAssembly.compile(bytes.slice())
    } catch (error) {
      debug(`WASM compilation failed for ${path}: ${describeCause(error)}`)
      throw new CompileError(path, describeCause(error), error)
    }

    const exports = inspectModule(bytes, path)
    debug(`Compiled ${path}: ${exports.length} exports`)
    return new WasmCompiledGuest(module, exports)
  }

  async instantiate(
    compiled: CompiledGuest,
    imports: HostImportObject,
    path: string,
    hooks: InstantiateHooks = {}
  ): Promise<GuestInstance> {
    if (!(compiled instanceof WasmCompiledGuest)) {
      throw new InstantiationError(path, new Error('module was not compiled by this engine'))
    }

    const useWasi = this.options.wasi ?? true
    const wasi = useWasi
      ? new WASI({
          version: 'preview1',
          args: [path],
          env: this.options.env ?? {},
          preopens: this.options.preopens ?? {}
        })
      : undefined

    const importObject: WebAssembly.Imports = wasi
      ? { ...wasi.getImportObject(), ...imports }
      : { ...imports }

    let instance: WebAssembly.Instance
    try {
      instance = await WebAssembly.instantiate(compiled.module, importObject)
    } catch (error) {
      debug(`WASM instantiation failed for ${path}: ${describeCause(error)}`)
      throw new InstantiationError(path, error)
    }

    const guest = new WasmGuestInstance(instance, compiled.exports)
    // Host imports must see memory before reactor constructors run
    hooks.onInstantiated?.(guest)
    try {
      this.initialize(guest, wasi)
    } catch (error) {
      throw new InstantiationError(path, error)
    }
    debug(`Instantiated ${path}`)
    return guest
  }

  /**
   * Command modules (with `_start`) are never started: their entry points
   * are called directly. Reactors get `_initialize` run once.
   */
  private initialize(guest: WasmGuestInstance, wasi: WASI | undefined): void {
    if (guest.hasFunction('_start')) {
      return
    }
    if (wasi && guest.memory) {
      wasi.initialize(guest.raw)
    } else if (guest.hasFunction('_initialize')) {
      guest.callExport('_initialize', [])
    }
  }
}
