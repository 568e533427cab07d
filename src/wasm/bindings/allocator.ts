/**
 * Host Heap Allocator
 *
 * Backs the host_malloc / host_free imports. Manages a reserved region of
 * the guest's linear memory with a first-fit free list, splitting blocks on
 * allocation and coalescing neighbours on free. Fresh space is taken from
 * the top of the region, growing the memory when needed.
 */

import Debug from 'debug'
import { WASM_PAGE_SIZE } from '../memory'
import { GuestMemory } from '../types'

const debug = Debug('hostlink:allocator')

export const DEFAULT_HEAP_BASE = 0x100000
export const DEFAULT_HEAP_LIMIT = 0x1000000
export const DEFAULT_ALIGNMENT = 8

export interface AllocatorOptions {
  /** First byte of the reserved region */
  heapBase?: number
  /** One past the last byte the allocator may hand out */
  heapLimit?: number
  alignment?: number
}

interface FreeBlock {
  offset: number
  size: number
}

export interface AllocatorStats {
  allocatedBlocks: number
  allocatedBytes: number
  freeBlocks: number
  top: number
}

export class FreeListAllocator {
  private readonly heapBase: number
  private readonly heapLimit: number
  private readonly alignment: number
  private readonly allocated: Map<number, number> = new Map()
  private freeList: FreeBlock[] = []
  private top: number

  constructor(
    private readonly memory: GuestMemory,
    options: AllocatorOptions = {}
  ) {
    this.alignment = options.alignment ?? DEFAULT_ALIGNMENT
    this.heapBase = alignUp(options.heapBase ?? DEFAULT_HEAP_BASE, this.alignment)
    this.heapLimit = options.heapLimit ?? DEFAULT_HEAP_LIMIT
    if (this.heapLimit <= this.heapBase) {
      throw new RangeError(`heapLimit ${this.heapLimit} must be above heapBase ${this.heapBase}`)
    }
    this.top = this.heapBase
  }

  /**
   * Allocate `size` bytes. Returns 0 when the request cannot be satisfied,
   * which guests treat as allocation failure.
   */
  allocate(size: number): number {
    if (!Number.isInteger(size) || size <= 0) {
      return 0
    }
    const needed = alignUp(size, this.alignment)

    const index = this.freeList.findIndex((block) => block.size >= needed)
    if (index !== -1) {
      const block = this.freeList[index]
      if (block.size === needed) {
        this.freeList.splice(index, 1)
      } else {
        this.freeList[index] = { offset: block.offset + needed, size: block.size - needed }
      }
      this.allocated.set(block.offset, needed)
      return block.offset
    }

    if (this.top + needed > this.heapLimit) {
      debug(`Heap exhausted: requested ${needed} bytes, top=${this.top}, limit=${this.heapLimit}`)
      return 0
    }
    const ptr = this.top
    if (!this.ensureCapacity(ptr + needed)) {
      return 0
    }
    this.top += needed
    this.allocated.set(ptr, needed)
    return ptr
  }

  /**
   * Release a block. Returns false for pointers this allocator did not hand out.
   */
  free(ptr: number): boolean {
    const size = this.allocated.get(ptr)
    if (size === undefined) {
      debug(`Ignoring free of unknown pointer ${ptr}`)
      return false
    }
    this.allocated.delete(ptr)
    this.insertFree({ offset: ptr, size })
    return true
  }

  sizeOf(ptr: number): number | undefined {
    return this.allocated.get(ptr)
  }

  stats(): AllocatorStats {
    let allocatedBytes = 0
    for (const size of this.allocated.values()) {
      allocatedBytes += size
    }
    return {
      allocatedBlocks: this.allocated.size,
      allocatedBytes,
      freeBlocks: this.freeList.length,
      top: this.top
    }
  }

  private insertFree(block: FreeBlock): void {
    let index = this.freeList.findIndex((b) => b.offset > block.offset)
    if (index === -1) {
      index = this.freeList.length
    }
    this.freeList.splice(index, 0, block)

    const next = this.freeList[index + 1]
    if (next !== undefined && block.offset + block.size === next.offset) {
      block.size += next.size
      this.freeList.splice(index + 1, 1)
    }
    const prev = this.freeList[index - 1]
    if (prev !== undefined && prev.offset + prev.size === block.offset) {
      prev.size += block.size
      this.freeList.splice(index, 1)
    }

    // Hand a trailing free block back to the top of the heap
    const last = this.freeList[this.freeList.length - 1]
    if (last !== undefined && last.offset + last.size === this.top) {
      this.top = last.offset
      this.freeList.pop()
    }
  }

  private ensureCapacity(end: number): boolean {
    const current = this.memory.byteLength
    if (end <= current) {
      return true
    }
    const pages = Math.ceil((end - current) / WASM_PAGE_SIZE)
    try {
      this.memory.grow(pages)
      debug(`Grew guest memory by ${pages} page(s)`)
      return true
    } catch (error) {
      debug(`Failed to grow guest memory by ${pages} page(s): ${error}`)
      return false
    }
  }
}

function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment
}
