/**
 * File watching primitives shared by the module hot reloader and the
 * configuration store. The factory is injectable so tests can drive
 * events without touching the filesystem.
 */

import * as fs from 'fs'

export interface WatchCallbacks {
  onEvent(eventType: string, filename: string | null): void
  onError(error: Error): void
}

export interface FileWatcher {
  close(): void
}

export type WatchFactory = (
  target: string,
  recursive: boolean,
  callbacks: WatchCallbacks
) => FileWatcher

/**
 * fs.watch-backed factory. Throws synchronously when the target cannot
 * be watched (missing path, unsupported platform option).
 */
export const nodeWatch: WatchFactory = (target, recursive, callbacks) => {
  const watcher = fs.watch(target, { recursive, persistent: true }, (eventType, filename) => {
    callbacks.onEvent(eventType, filename)
  })
  watcher.on('error', (error: Error) => callbacks.onError(error))
  return watcher
}

/**
 * Handle returned by every `start()`/`startWatching()`: stop the watcher
 * with `close()`, or await `closed` to learn when the watch loop ended.
 */
export interface WatchHandle {
  readonly closed: Promise<void>
  close(): Promise<void>
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath)
    return true
  } catch {
    return false
  }
}
