/**
 * WASM Host Types
 *
 * Shared type definitions for the guest module runtime
 */

/**
 * WASM value types that can appear in an exported function signature
 */
export type WasmValueType = 'i32' | 'i64' | 'f32' | 'f64' | 'v128' | 'funcref' | 'externref'

export type ExportKind = 'function' | 'table' | 'memory' | 'global' | 'tag'

export interface FunctionSignature {
  params: WasmValueType[]
  results: WasmValueType[]
}

/**
 * An export as described by the module binary.
 * `signature` is present for function exports only.
 */
export interface ExportDescriptor {
  name: string
  kind: ExportKind
  signature?: FunctionSignature
}

/**
 * Byte-level access to a guest's linear memory
 */
export interface GuestMemory {
  readonly byteLength: number
  read(ptr: number, len: number): Uint8Array
  write(ptr: number, bytes: Uint8Array): void
  /** Grow by whole 64 KiB pages; returns the previous size in pages */
  grow(deltaPages: number): number
}

/**
 * A compiled guest module, reusable for any number of instantiations
 */
export interface CompiledGuest {
  readonly exports: ReadonlyArray<ExportDescriptor>
}

export type GuestValue = number | bigint

/**
 * A live guest instance with its private execution context
 */
export interface GuestInstance {
  readonly memory: GuestMemory | undefined
  describeExport(name: string): ExportDescriptor | undefined
  callExport(name: string, args: GuestValue[]): GuestValue | undefined
}

/**
 * Functions the host exposes to guests, keyed by import module then name
 */
export type HostFunction = (...args: number[]) => number | void
export type HostImportObject = Record<string, Record<string, HostFunction>>

/**
 * Hooks the engine calls once an instance exists, so host imports
 * can be bound to that instance's memory
 */
export interface InstantiateHooks {
  onInstantiated?: (instance: GuestInstance) => void
}

/**
 * The compile/instantiate capability the cache drives
 */
export interface GuestEngine {
  compile(bytes: Uint8Array, path: string): Promise<CompiledGuest>
  instantiate(
    module: CompiledGuest,
    imports: HostImportObject,
    path: string,
    hooks?: InstantiateHooks
  ): Promise<GuestInstance>
}

/**
 * WASM binary format types
 */
export type WasmFormat = 'core' | 'component' | 'unknown'
