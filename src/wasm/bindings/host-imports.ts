/**
 * Host Imports
 *
 * Builds the import object every guest is instantiated with: the
 * universal invocation entry point plus the host heap functions.
 * Memory and allocator are filled in once the instance exists.
 */

import Debug from 'debug'
import { GuestInstance, GuestMemory, HostImportObject } from '../types'
import { AllocatorOptions, FreeListAllocator } from './allocator'
import { HostMethodRegistry } from './host-methods'
import { universalInvoke } from './universal-invoke'

const debug = Debug('hostlink:bindings')

export const HOST_IMPORT_MODULE = 'hostlink'

export interface HostImportsOptions {
  path: string
  registry: HostMethodRegistry
  memoryRef: { current: GuestMemory | null }
  allocatorRef: { current: FreeListAllocator | null }
}

export function createHostImports(options: HostImportsOptions): HostImportObject {
  const { path, registry, memoryRef, allocatorRef } = options

  return {
    [HOST_IMPORT_MODULE]: {
      universal_invoke: (
        methodNamePtr: number,
        methodNameLen: number,
        format: number,
        paramsPtr: number,
        paramsLen: number,
        responsePtr: number
      ): number =>
        universalInvoke(memoryRef.current ?? undefined, registry, {
          methodNamePtr,
          methodNameLen,
          format,
          paramsPtr,
          paramsLen,
          responsePtr
        }),

      host_malloc: (size: number): number => {
        if (!allocatorRef.current) {
          debug(`[${path}] host_malloc called but guest exports no memory`)
          return 0
        }
        return allocatorRef.current.allocate(size)
      },

      host_free: (ptr: number): void => {
        if (allocatorRef.current) {
          allocatorRef.current.free(ptr)
        }
      }
    }
  }
}

export interface HostBindings {
  imports: HostImportObject
  onInstantiated: (instance: GuestInstance) => void
}

/**
 * Create imports for one instantiation, together with the hook that binds
 * them to the new instance's memory.
 */
export function createHostBindings(
  path: string,
  registry: HostMethodRegistry,
  allocatorOptions?: AllocatorOptions
): HostBindings {
  const memoryRef: { current: GuestMemory | null } = { current: null }
  const allocatorRef: { current: FreeListAllocator | null } = { current: null }

  return {
    imports: createHostImports({ path, registry, memoryRef, allocatorRef }),
    onInstantiated: (instance: GuestInstance) => {
      if (instance.memory) {
        memoryRef.current = instance.memory
        allocatorRef.current = new FreeListAllocator(instance.memory, allocatorOptions)
      } else {
        debug(`[${path}] guest exports no memory; host calls will fail`)
      }
    }
  }
}
