/**
 * Guest Module / Instance Cache
 *
 * Two tiers per module path:
 * - compiled modules, keyed by path and reused while the file's bytes are
 *   unchanged (compilation is the expensive step)
 * - live instances, one per path, each with its own memory and bound
 *   host imports
 *
 * Records are replaced, never mutated. Loads are asynchronous, so every
 * path has a single in-flight load that concurrent callers share; a path
 * is compiled at most once per content digest. Invalidation and refresh
 * bump the path's epoch so a load that started earlier is returned to its
 * own callers but never stored.
 */

import { createHash } from 'crypto'
import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import {
  CompileError,
  describeCause,
  HostlinkError,
  InstantiationError,
  IoError
} from '../errors'
import { AllocatorOptions } from './bindings/allocator'
import { createHostBindings } from './bindings/host-imports'
import { HostMethodRegistry } from './bindings/host-methods'
import { WebAssemblyEngine } from './engine'
import { CompiledGuest, GuestEngine, GuestInstance } from './types'

const debug = Debug('hostlink:cache')

export interface ModuleRecord {
  readonly path: string
  readonly digest: string
  readonly compiled: CompiledGuest
  readonly compiledAt: number
}

export interface InstanceHandle {
  readonly path: string
  readonly module: ModuleRecord
  readonly instance: GuestInstance
  /** Increases with every instance the cache builds */
  readonly generation: number
  readonly createdAt: number
}

export interface InstanceCacheOptions {
  engine?: GuestEngine
  registry?: HostMethodRegistry
  allocator?: AllocatorOptions
  readFile?: (filePath: string) => Promise<Uint8Array>
}

export interface CacheStats {
  modules: number
  instances: number
  compiles: number
  instantiations: number
  hits: number
}

export class InstanceCache {
  readonly registry: HostMethodRegistry
  private readonly engine: GuestEngine
  private readonly allocatorOptions: AllocatorOptions | undefined
  private readonly readFile: (filePath: string) => Promise<Uint8Array>

  private readonly modules: Map<string, ModuleRecord> = new Map()
  private readonly instances: Map<string, InstanceHandle> = new Map()
  private readonly pendingLoads: Map<string, Promise<InstanceHandle>> = new Map()
  private readonly pendingCompiles: Map<string, Promise<ModuleRecord>> = new Map()
  private readonly epochs: Map<string, number> = new Map()
  private readonly invalidations: Map<string, number> = new Map()

  private generation = 0
  private compiles = 0
  private instantiations = 0
  private hits = 0

  constructor(options: InstanceCacheOptions = {}) {
    this.engine = options.engine ?? new WebAssemblyEngine()
    this.registry = options.registry ?? new HostMethodRegistry()
    this.allocatorOptions = options.allocator
    this.readFile = options.readFile ?? ((filePath) => fs.promises.readFile(filePath))
  }

  static key(modulePath: string): string {
    return path.resolve(modulePath)
  }

  /**
   * Return the live instance for `modulePath`, loading it on a miss
   */
  async getOrLoad(modulePath: string): Promise<InstanceHandle> {
    const key = InstanceCache.key(modulePath)
    const cached = this.instances.get(key)
    if (cached) {
      this.hits++
      return cached
    }
    const inFlight = this.pendingLoads.get(key)
    if (inFlight) {
      debug(`Joining in-flight load of ${key}`)
      return inFlight
    }
    return this.startLoad(key)
  }

  /**
   * Drop both tiers for `modulePath`. No-op for unknown paths.
   */
  invalidate(modulePath: string): void {
    const key = InstanceCache.key(modulePath)
    const hadModule = this.modules.delete(key)
    const hadInstance = this.instances.delete(key)
    this.pendingLoads.delete(key)
    for (const compileKey of this.pendingCompiles.keys()) {
      if (compileKey.startsWith(`${key}\0`)) {
        this.pendingCompiles.delete(compileKey)
      }
    }
    this.bumpEpoch(key)
    this.invalidations.set(key, (this.invalidations.get(key) ?? 0) + 1)
    if (hadModule || hadInstance) {
      debug(`Invalidated ${key}`)
    }
  }

  /**
   * Rebuild `modulePath` from the current file contents.
   * Handles issued before this call are never handed out again.
   */
  async hotReload(modulePath: string): Promise<InstanceHandle> {
    this.invalidate(modulePath)
    return this.getOrLoad(modulePath)
  }

  /**
   * Replace only the instance tier. The file is re-read and the compiled
   * module reused when its digest is unchanged.
   */
  async refresh(modulePath: string): Promise<InstanceHandle> {
    const key = InstanceCache.key(modulePath)
    this.instances.delete(key)
    this.pendingLoads.delete(key)
    this.bumpEpoch(key)
    return this.startLoad(key)
  }

  /** The cached instance, without loading */
  peek(modulePath: string): InstanceHandle | undefined {
    return this.instances.get(InstanceCache.key(modulePath))
  }

  has(modulePath: string): boolean {
    return this.instances.has(InstanceCache.key(modulePath))
  }

  paths(): string[] {
    return Array.from(this.instances.keys()).sort()
  }

  clear(): void {
    for (const key of new Set([...this.modules.keys(), ...this.instances.keys()])) {
      this.invalidate(key)
    }
  }

  stats(): CacheStats {
    return {
      modules: this.modules.size,
      instances: this.instances.size,
      compiles: this.compiles,
      instantiations: this.instantiations,
      hits: this.hits
    }
  }

  private epochOf(key: string): number {
    return this.epochs.get(key) ?? 0
  }

  private bumpEpoch(key: string): void {
    this.epochs.set(key, this.epochOf(key) + 1)
  }

  private startLoad(key: string): Promise<InstanceHandle> {
    const epoch = this.epochOf(key)
    const load: Promise<InstanceHandle> = this.load(key)
      .then((handle) => {
        if (this.epochOf(key) === epoch) {
          this.instances.set(key, handle)
        } else {
          debug(`Discarding stale instance of ${key} (generation ${handle.generation})`)
        }
        return handle
      })
      .finally(() => {
        if (this.pendingLoads.get(key) === load) {
          this.pendingLoads.delete(key)
        }
      })
    this.pendingLoads.set(key, load)
    return load
  }

  private async load(key: string): Promise<InstanceHandle> {
    const invalidations = this.invalidations.get(key) ?? 0
    let bytes: Uint8Array
    try {
      bytes = await this.readFile(key)
    } catch (error) {
      throw new IoError(key, 'read guest module', error)
    }

    const digest = createHash('sha256').update(bytes).digest('hex')
    const module = await this.compileOnce(key, digest, bytes, invalidations)
    return this.instantiate(key, module)
  }

  /**
   * The record is stored only if the path was not invalidated since
   * `invalidations` was observed, i.e. since its bytes were read.
   */
  private compileOnce(
    key: string,
    digest: string,
    bytes: Uint8Array,
    invalidations: number
  ): Promise<ModuleRecord> {
    const existing = this.modules.get(key)
    if (existing && existing.digest === digest) {
      debug(`Reusing compiled module for ${key}`)
      return Promise.resolve(existing)
    }

    const compileKey = `${key}\0${digest}`
    const inFlight = this.pendingCompiles.get(compileKey)
    if (inFlight) {
      return inFlight
    }

    const compile: Promise<ModuleRecord> = this.compile(key, digest, bytes)
      .then((record) => {
        if ((this.invalidations.get(key) ?? 0) === invalidations) {
          this.modules.set(key, record)
        }
        return record
      })
      .finally(() => {
        if (this.pendingCompiles.get(compileKey) === compile) {
          this.pendingCompiles.delete(compileKey)
        }
      })
    this.pendingCompiles.set(compileKey, compile)
    return compile
  }

  private async compile(key: string, digest: string, bytes: Uint8Array): Promise<ModuleRecord> {
    debug(`Compiling ${key} (${bytes.length} bytes)`)
    this.compiles++
    let compiled: CompiledGuest
    try {
      compiled = await this.engine.compile(bytes, key)
    } catch (error) {
      if (error instanceof HostlinkError) {
        throw error
      }
      throw new CompileError(key, describeCause(error), error)
    }
    return { path: key, digest, compiled, compiledAt: Date.now() }
  }

  private async instantiate(key: string, module: ModuleRecord): Promise<InstanceHandle> {
    const bindings = createHostBindings(key, this.registry, this.allocatorOptions)
    this.instantiations++
    let instance: GuestInstance
    try {
      instance = await this.engine.instantiate(module.compiled, bindings.imports, key, {
        onInstantiated: bindings.onInstantiated
      })
    } catch (error) {
      if (error instanceof HostlinkError) {
        throw error
      }
      throw new InstantiationError(key, error)
    }
    const generation = ++this.generation
    debug(`Instantiated ${key} (generation ${generation})`)
    return { path: key, module, instance, generation, createdAt: Date.now() }
  }
}
