/**
 * Guest Module Hot Reloader
 *
 * Watches a directory tree and rebuilds cached guest modules whose files
 * change, without restarting the host. Reload failures are logged and
 * watching continues; only a watcher error or an explicit close ends
 * the loop.
 */

import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import { describeCause, IoError } from '../errors'
import { fileExists, FileWatcher, nodeWatch, WatchFactory, WatchHandle } from '../utils/file-watch'
import { InstanceCache, InstanceHandle } from './instance-cache'

const debug = Debug('hostlink:reload')

export const GUEST_MODULE_EXTENSION = '.wasm'
export const DEFAULT_DEBOUNCE_MS = 50

export interface HotReloaderOptions {
  /** File suffix that marks a guest module (default `.wasm`) */
  extension?: string
  /** Coalesce bursts of events per path; 0 reloads once per event */
  debounceMs?: number
  recursive?: boolean
  watch?: WatchFactory
  onReload?: (modulePath: string, outcome: ReloadOutcome) => void
}

export type ReloadOutcome =
  | { ok: true; handle: InstanceHandle }
  | { ok: false; error: unknown }

export interface ReloaderStats {
  events: number
  reloads: number
  failures: number
}

export class HotReloader {
  private readonly dir: string
  private readonly extension: string
  private readonly debounceMs: number
  private readonly recursive: boolean
  private readonly watchFactory: WatchFactory

  private watcher: FileWatcher | null = null
  private stopped = true
  private readonly timers: Map<string, NodeJS.Timeout> = new Map()
  private readonly burstKinds: Map<string, string> = new Map()
  private readonly queues: Map<string, Promise<void>> = new Map()
  private readonly counters: ReloaderStats = { events: 0, reloads: 0, failures: 0 }

  constructor(
    private readonly cache: InstanceCache,
    watchDir: string,
    private readonly options: HotReloaderOptions = {}
  ) {
    this.dir = path.resolve(watchDir)
    this.extension = options.extension ?? GUEST_MODULE_EXTENSION
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS
    this.recursive = options.recursive ?? true
    this.watchFactory = options.watch ?? nodeWatch
  }

  get watchPath(): string {
    return this.dir
  }

  /**
   * Begin watching. Throws IoError if the directory cannot be watched.
   */
  start(): WatchHandle {
    if (!this.stopped) {
      throw new Error(`Hot reloader already watching ${this.dir}`)
    }

    let finish: () => void = () => {}
    const closed = new Promise<void>((resolve) => {
      finish = resolve
    })

    try {
      if (!fs.statSync(this.dir).isDirectory()) {
        throw new Error('not a directory')
      }
      this.watcher = this.watchFactory(this.dir, this.recursive, {
        onEvent: (eventType, filename) => this.handleEvent(eventType, filename),
        onError: (error) => {
          debug(`[HotReload] Watcher error on ${this.dir}: ${error.message}`)
          this.shutdown()
          void this.idle().then(finish)
        }
      })
    } catch (error) {
      throw new IoError(this.dir, 'watch directory', error)
    }

    this.stopped = false
    debug(`[HotReload] Started watching: ${this.dir}`)

    return {
      closed,
      close: async () => {
        this.shutdown()
        await this.idle()
        finish()
      }
    }
  }

  /**
   * Resolves once every queued reload has settled
   */
  async idle(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all(this.queues.values())
    }
  }

  stats(): ReloaderStats {
    return { ...this.counters }
  }

  private shutdown(): void {
    if (this.stopped) {
      return
    }
    this.stopped = true
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
    this.burstKinds.clear()
    this.watcher?.close()
    this.watcher = null
    debug(`[HotReload] Stopped watching: ${this.dir}`)
  }

  private handleEvent(eventType: string, filename: string | null): void {
    if (this.stopped || !filename || !filename.endsWith(this.extension)) {
      return
    }
    this.counters.events++
    const modulePath = path.join(this.dir, filename)
    debug(`[HotReload] Detected ${eventType} on ${modulePath}`)

    if (this.debounceMs <= 0) {
      this.enqueue(modulePath, eventType)
      return
    }

    // A burst containing any content change reloads unconditionally
    const previous = this.burstKinds.get(modulePath)
    this.burstKinds.set(modulePath, previous === 'change' ? 'change' : eventType)
    const pending = this.timers.get(modulePath)
    if (pending) {
      clearTimeout(pending)
    }
    this.timers.set(
      modulePath,
      setTimeout(() => {
        this.timers.delete(modulePath)
        const kind = this.burstKinds.get(modulePath) ?? eventType
        this.burstKinds.delete(modulePath)
        this.enqueue(modulePath, kind)
      }, this.debounceMs)
    )
  }

  /** Reloads of one path run in arrival order */
  private enqueue(modulePath: string, eventType: string): void {
    const previous = this.queues.get(modulePath) ?? Promise.resolve()
    const run = (): Promise<void> => this.reload(modulePath, eventType)
    const next = previous.then(run, run)
    this.queues.set(modulePath, next)
    void next.finally(() => {
      if (this.queues.get(modulePath) === next) {
        this.queues.delete(modulePath)
      }
    })
  }

  private async reload(modulePath: string, eventType: string): Promise<void> {
    if (this.stopped) {
      return
    }
    if (eventType === 'rename' && !(await fileExists(modulePath))) {
      debug(`[HotReload] ${modulePath} was removed; keeping cached state`)
      return
    }
    let outcome: ReloadOutcome
    try {
      const handle = await this.cache.hotReload(modulePath)
      this.counters.reloads++
      debug(`[HotReload] Successfully hot reloaded: ${modulePath} (generation ${handle.generation})`)
      outcome = { ok: true, handle }
    } catch (error) {
      this.counters.failures++
      debug(`[HotReload] Failed to hot reload: ${modulePath}, error: ${describeCause(error)}`)
      outcome = { ok: false, error }
    }
    this.notify(modulePath, outcome)
  }

  private notify(modulePath: string, outcome: ReloadOutcome): void {
    try {
      this.options.onReload?.(modulePath, outcome)
    } catch (error) {
      debug(`[HotReload] Reload listener failed for ${modulePath}: ${describeCause(error)}`)
    }
  }
}
