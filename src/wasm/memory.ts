/**
 * Guest Memory Access
 *
 * Bounds-checked reads and writes against a guest's linear memory.
 */

import { describeCause, MemoryAccessError, ProtocolError } from '../errors'
import { GuestMemory } from './types'

export const WASM_PAGE_SIZE = 65536

/**
 * GuestMemory backed by a WebAssembly.Memory.
 *
 * The underlying ArrayBuffer is re-read on every access because
 * `memory.grow()` detaches the previous buffer.
 */
export class LinearMemory implements GuestMemory {
  constructor(private readonly memory: WebAssembly.Memory) {}

  get byteLength(): number {
    return this.memory.buffer.byteLength
  }

  read(ptr: number, len: number): Uint8Array {
    this.check(ptr, len)
    return new Uint8Array(this.memory.buffer, ptr, len).slice()
  }

  write(ptr: number, bytes: Uint8Array): void {
    this.check(ptr, bytes.length)
    new Uint8Array(this.memory.buffer).set(bytes, ptr)
  }

  grow(deltaPages: number): number {
    return this.memory.grow(deltaPages)
  }

  private check(ptr: number, len: number): void {
    const size = this.memory.buffer.byteLength
    if (!Number.isInteger(ptr) || !Number.isInteger(len) || ptr < 0 || len < 0 || ptr + len > size) {
      throw new MemoryAccessError(ptr, len, size)
    }
  }
}

/**
 * Read a NUL-terminated byte string starting at `ptr`.
 * Reading runs until a zero byte; running off the end of memory
 * surfaces as a MemoryAccessError.
 */
export function readCString(memory: GuestMemory, ptr: number): Uint8Array {
  const chunks: number[] = []
  let offset = ptr
  for (;;) {
    const byte = memory.read(offset, 1)[0]
    if (byte === 0) {
      break
    }
    chunks.push(byte)
    offset++
  }
  return Uint8Array.from(chunks)
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true })

export function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return strictDecoder.decode(bytes)
  } catch (error) {
    throw new ProtocolError(`${what} is not valid UTF-8`, error)
  }
}

/**
 * Read `len` bytes of JSON from guest memory and parse them
 */
export function readJson(memory: GuestMemory, ptr: number, len: number): unknown {
  const text = decodeUtf8(memory.read(ptr, len), 'JSON payload')
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ProtocolError(`Invalid JSON payload at ${ptr}: ${describeCause(error)}`, error)
  }
}

/**
 * Serialize `value` as JSON into guest memory at `ptr`.
 * Returns the number of bytes written.
 */
export function writeJson(memory: GuestMemory, ptr: number, value: unknown): number {
  const bytes = new TextEncoder().encode(JSON.stringify(value))
  memory.write(ptr, bytes)
  return bytes.length
}
