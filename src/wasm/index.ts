/**
 * Guest module runtime
 *
 * Public API of the WebAssembly host: cache, hot reload, host methods,
 * entry gate and the runtime facade that ties them together.
 */

// Runtime
export { HostRuntime } from './runtime'
export type { HostRuntimeOptions } from './runtime'

// Cache
export { InstanceCache } from './instance-cache'
export type { CacheStats, InstanceCacheOptions, InstanceHandle, ModuleRecord } from './instance-cache'

// Hot reload
export { DEFAULT_DEBOUNCE_MS, GUEST_MODULE_EXTENSION, HotReloader } from './hot-reloader'
export type { HotReloaderOptions, ReloadOutcome, ReloaderStats } from './hot-reloader'

// Entry gate
export { DEFAULT_INSTANCE_POLICY, EntryGate, invokeEntry } from './entry-gate'
export type { EntryCallResult, EntryFunctionSource, EntryGateOptions, InstancePolicy } from './entry-gate'

// Engine and binary inspection
export { WebAssemblyEngine } from './engine'
export type { WebAssemblyEngineOptions } from './engine'
export { detectWasmFormat, formatSignature, inspectModule } from './wasm-binary'

// Memory
export { decodeUtf8, LinearMemory, readCString, readJson, writeJson, WASM_PAGE_SIZE } from './memory'

// Host bindings
export { FreeListAllocator } from './bindings/allocator'
export type { AllocatorOptions, AllocatorStats } from './bindings/allocator'
export { createHostBindings, createHostImports, HOST_IMPORT_MODULE } from './bindings/host-imports'
export { handlerFromFunction, HostMethodRegistry, jsonHandler } from './bindings/host-methods'
export type { HandlerResult, HostMethodFunction, HostMethodHandler } from './bindings/host-methods'
export { formatFromDiscriminant, formatName, SerializationFormat } from './bindings/serialization'
export {
  encodeResponse,
  ProtocolStatus,
  readResponse,
  RESPONSE_HEADER_SIZE,
  universalInvoke
} from './bindings/universal-invoke'
export type { InvokeCall } from './bindings/universal-invoke'

export type * from './types'
