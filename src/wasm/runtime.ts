/**
 * Host Runtime
 *
 * Wires the registry, cache, configuration store, hot reloader and entry
 * gate together and owns the watcher handles.
 */

import Debug from 'debug'
import { DynamicConfig, DynamicConfigOptions, DEFAULT_CONFIG_PATH } from '../config/dynamic-config'
import { WatchHandle } from '../utils/file-watch'
import { AllocatorOptions } from './bindings/allocator'
import { HostMethodFunction, HostMethodHandler, HostMethodRegistry } from './bindings/host-methods'
import { EntryCallResult, EntryGate, InstancePolicy } from './entry-gate'
import { HotReloader, HotReloaderOptions } from './hot-reloader'
import { InstanceCache, InstanceHandle } from './instance-cache'
import { GuestEngine } from './types'

const debug = Debug('hostlink:engine')

export interface HostRuntimeOptions {
  engine?: GuestEngine
  registry?: HostMethodRegistry
  allocator?: AllocatorOptions
  /** Directory to hot reload guest modules from */
  watchDir?: string
  reloader?: HotReloaderOptions
  /** Reload the configuration when its file changes (default true) */
  watchConfig?: boolean
  instancePolicy?: InstancePolicy
}

export class HostRuntime {
  readonly registry: HostMethodRegistry
  readonly cache: InstanceCache
  readonly gate: EntryGate
  private readonly reloader: HotReloader | undefined
  private handles: WatchHandle[] = []
  private started = false

  constructor(
    readonly config: DynamicConfig,
    private readonly options: HostRuntimeOptions = {}
  ) {
    this.registry = options.registry ?? new HostMethodRegistry()
    this.cache = new InstanceCache({
      engine: options.engine,
      registry: this.registry,
      allocator: options.allocator
    })
    this.gate = new EntryGate(this.cache, config, { instancePolicy: options.instancePolicy })
    this.reloader = options.watchDir
      ? new HotReloader(this.cache, options.watchDir, options.reloader)
      : undefined
  }

  /**
   * Load the configuration file (missing = empty) and build a runtime
   */
  static async create(
    configPath: string = DEFAULT_CONFIG_PATH,
    options: HostRuntimeOptions = {},
    configOptions: DynamicConfigOptions = {}
  ): Promise<HostRuntime> {
    const config = await DynamicConfig.load(configPath, configOptions)
    return new HostRuntime(config, options)
  }

  get running(): boolean {
    return this.started
  }

  /**
   * Start the module and configuration watchers. Throws if the module
   * directory cannot be watched; nothing is left running in that case.
   */
  start(): void {
    if (this.running) {
      throw new Error('Host runtime already started')
    }
    const handles: WatchHandle[] = []
    if (this.reloader) {
      handles.push(this.reloader.start())
    }
    if (this.options.watchConfig ?? true) {
      try {
        handles.push(this.config.startWatching())
      } catch (error) {
        for (const handle of handles) {
          void handle.close()
        }
        throw error
      }
    }
    this.handles = handles
    this.started = true
    debug(`Host runtime started (${handles.length} watcher(s))`)
  }

  async stop(): Promise<void> {
    const handles = this.handles
    this.handles = []
    this.started = false
    await Promise.all(handles.map((handle) => handle.close()))
    debug('Host runtime stopped')
  }

  registerHostMethod(name: string, handler: HostMethodHandler | HostMethodFunction): boolean {
    return this.registry.register(name, handler)
  }

  load(modulePath: string): Promise<InstanceHandle> {
    return this.cache.getOrLoad(modulePath)
  }

  callEntry(modulePath: string, funcName: string): Promise<EntryCallResult> {
    return this.gate.callEntry(modulePath, funcName)
  }
}
