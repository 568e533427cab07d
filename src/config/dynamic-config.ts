/**
 * Dynamic Configuration Store
 *
 * Holds the entry function allowlist read from a JSON file:
 *
 *   { "entry_functions": { "<module path>": ["<export>", ...] } }
 *
 * The active snapshot is frozen and replaced by a single assignment, so a
 * reader sees either the old or the new mapping, never a mix.
 */

import { EventEmitter } from 'events'
import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import { z } from 'zod'
import { ConfigError, describeCause, HostlinkError, IoError } from '../errors'
import { FileWatcher, nodeWatch, WatchFactory, WatchHandle } from '../utils/file-watch'

const debug = Debug('hostlink:config')

export const DEFAULT_CONFIG_PATH = 'wasm-hostlink.json'
export const DEFAULT_CONFIG_DEBOUNCE_MS = 50

export const configFileSchema = z.object({
  entry_functions: z.record(z.array(z.string())).default({})
})

export type ConfigFile = z.infer<typeof configFileSchema>

export interface ConfigSnapshot {
  readonly entryFunctions: ReadonlyMap<string, ReadonlyArray<string>>
}

export interface DynamicConfigOptions {
  watch?: WatchFactory
  /** Coalesce bursts of file events; 0 reloads once per event */
  debounceMs?: number
}

export function createSnapshot(entryFunctions: Record<string, ReadonlyArray<string>>): ConfigSnapshot {
  const entries = new Map<string, ReadonlyArray<string>>()
  for (const [modulePath, functions] of Object.entries(entryFunctions)) {
    entries.set(modulePath, Object.freeze([...functions]))
  }
  return Object.freeze({ entryFunctions: entries })
}

export const EMPTY_SNAPSHOT: ConfigSnapshot = createSnapshot({})

/**
 * Parse configuration text. Blank text is an empty configuration.
 */
export function parseConfig(text: string, configPath: string): ConfigSnapshot {
  if (text.trim() === '') {
    return EMPTY_SNAPSHOT
  }
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(configPath, describeCause(error), error)
  }
  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(configPath, detail, parsed.error)
  }
  return createSnapshot(parsed.data.entry_functions)
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readSnapshot(configPath: string): Promise<ConfigSnapshot> {
  let text: string
  try {
    text = await fs.promises.readFile(configPath, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      debug(`Config file ${configPath} not found, using empty configuration`)
      return EMPTY_SNAPSHOT
    }
    throw new IoError(configPath, 'read configuration', error)
  }
  return parseConfig(text, configPath)
}

export function toConfigFile(snapshot: ConfigSnapshot): ConfigFile {
  const entryFunctions: Record<string, string[]> = {}
  for (const [modulePath, functions] of snapshot.entryFunctions) {
    entryFunctions[modulePath] = [...functions]
  }
  return { entry_functions: entryFunctions }
}

export async function saveConfig(configPath: string, snapshot: ConfigSnapshot): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(path.resolve(configPath)), { recursive: true })
    await fs.promises.writeFile(configPath, JSON.stringify(toConfigFile(snapshot), null, 2) + '\n')
  } catch (error) {
    throw new IoError(configPath, 'write configuration', error)
  }
  debug(`Saved configuration to ${configPath}`)
}

/**
 * Write an empty configuration unless the file exists.
 *
 * @returns true if a file was created
 */
export async function ensureConfigFile(configPath: string = DEFAULT_CONFIG_PATH): Promise<boolean> {
  if (fs.existsSync(configPath)) {
    return false
  }
  await saveConfig(configPath, EMPTY_SNAPSHOT)
  debug(`Created default configuration at ${configPath}`)
  return true
}

export interface DynamicConfig {
  on(event: 'reload', listener: (snapshot: ConfigSnapshot) => void): this
  once(event: 'reload', listener: (snapshot: ConfigSnapshot) => void): this
  off(event: 'reload', listener: (snapshot: ConfigSnapshot) => void): this
  emit(event: 'reload', snapshot: ConfigSnapshot): boolean
}

export class DynamicConfig extends EventEmitter {
  readonly path: string
  private current: ConfigSnapshot
  private readonly watchFactory: WatchFactory
  private readonly debounceMs: number

  constructor(configPath: string, snapshot: ConfigSnapshot = EMPTY_SNAPSHOT, options: DynamicConfigOptions = {}) {
    super()
    this.path = configPath
    this.current = snapshot
    this.watchFactory = options.watch ?? nodeWatch
    this.debounceMs = options.debounceMs ?? DEFAULT_CONFIG_DEBOUNCE_MS
  }

  /**
   * Read `configPath`. A missing file yields an empty configuration;
   * malformed content throws ConfigError.
   */
  static async load(configPath: string, options: DynamicConfigOptions = {}): Promise<DynamicConfig> {
    const snapshot = await readSnapshot(configPath)
    debug(`Loaded configuration from ${configPath}: ${snapshot.entryFunctions.size} module(s)`)
    return new DynamicConfig(configPath, snapshot, options)
  }

  snapshot(): ConfigSnapshot {
    return this.current
  }

  /**
   * Entry functions permitted for `modulePath`, matched exactly as
   * written in the file. Empty when the module is not listed.
   */
  getEntryFunctionsForFile(modulePath: string): string[] {
    return [...(this.current.entryFunctions.get(modulePath) ?? [])]
  }

  /**
   * Re-read the file and swap the snapshot. On failure the previous
   * snapshot stays active.
   *
   * @returns whether the new snapshot was installed
   */
  async reload(): Promise<boolean> {
    let next: ConfigSnapshot
    try {
      next = await readSnapshot(this.path)
    } catch (error) {
      if (!(error instanceof HostlinkError)) {
        throw error
      }
      debug(`Failed to reload configuration: ${error.message}`)
      return false
    }
    this.current = next
    debug(`Configuration reloaded from ${this.path}`)
    this.emit('reload', next)
    return true
  }

  /**
   * Reload whenever the file is modified. The parent directory is watched
   * so that editors replacing the file atomically are still seen.
   * Watching a missing file logs a warning and returns an inert handle.
   */
  startWatching(): WatchHandle {
    if (!fs.existsSync(this.path)) {
      debug(`Warning: config file ${this.path} does not exist, not watching`)
      return { closed: Promise.resolve(), close: () => Promise.resolve() }
    }

    const dir = path.dirname(path.resolve(this.path))
    const basename = path.basename(this.path)
    let watcher: FileWatcher | null = null
    let timer: NodeJS.Timeout | null = null
    let chain: Promise<unknown> = Promise.resolve()
    let stopped = false
    let finish: () => void = () => {}
    const closed = new Promise<void>((resolve) => {
      finish = resolve
    })

    const schedule = (): void => {
      chain = chain
        .then(() => (stopped ? false : this.reload()))
        .catch((error: unknown) => debug(`Configuration reload failed: ${describeCause(error)}`))
    }

    const stop = async (): Promise<void> => {
      if (!stopped) {
        stopped = true
        if (timer) {
          clearTimeout(timer)
          timer = null
        }
        watcher?.close()
        watcher = null
        debug(`Stopped watching ${this.path}`)
      }
      await chain
      finish()
    }

    try {
      watcher = this.watchFactory(dir, false, {
        onEvent: (_eventType, filename) => {
          if (stopped || filename !== basename) {
            return
          }
          if (this.debounceMs <= 0) {
            schedule()
            return
          }
          if (timer) {
            clearTimeout(timer)
          }
          timer = setTimeout(() => {
            timer = null
            schedule()
          }, this.debounceMs)
        },
        onError: (error) => {
          debug(`Config watcher error: ${error.message}`)
          void stop()
        }
      })
    } catch (error) {
      throw new IoError(this.path, 'watch configuration', error)
    }

    debug(`Watching configuration ${this.path}`)
    return { closed, close: stop }
  }
}
