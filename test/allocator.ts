import { expect } from 'chai'
import { DEFAULT_HEAP_BASE, FreeListAllocator } from '../src/wasm/bindings/allocator'
import { ArrayMemory } from './helpers/array-memory'

describe('FreeListAllocator', () => {
  const options = { heapBase: 1024, heapLimit: 4096 }

  it('hands out aligned blocks from the heap base', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    expect(allocator.allocate(10)).to.equal(1024)
    expect(allocator.allocate(8)).to.equal(1040)
    expect(allocator.sizeOf(1024)).to.equal(16)
    expect(allocator.stats()).to.deep.equal({
      allocatedBlocks: 2,
      allocatedBytes: 24,
      freeBlocks: 0,
      top: 1048
    })
  })

  it('returns 0 for non-positive or fractional sizes', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    expect(allocator.allocate(0)).to.equal(0)
    expect(allocator.allocate(-4)).to.equal(0)
    expect(allocator.allocate(1.5)).to.equal(0)
  })

  it('reuses freed blocks first fit and splits them', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    allocator.allocate(16)
    const b = allocator.allocate(16)
    allocator.allocate(16)
    expect(allocator.free(b)).to.equal(true)

    expect(allocator.allocate(8)).to.equal(1040)
    expect(allocator.allocate(8)).to.equal(1048)
    expect(allocator.stats().freeBlocks).to.equal(0)
  })

  it('coalesces neighbouring free blocks', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    const a = allocator.allocate(16)
    const b = allocator.allocate(16)
    allocator.allocate(16)
    allocator.free(a)
    allocator.free(b)

    expect(allocator.stats().freeBlocks).to.equal(1)
    expect(allocator.allocate(32)).to.equal(1024)
  })

  it('returns a trailing free block to the top of the heap', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    const a = allocator.allocate(16)
    const b = allocator.allocate(16)
    allocator.free(b)
    expect(allocator.stats().top).to.equal(1040)
    allocator.free(a)
    expect(allocator.stats()).to.deep.equal({
      allocatedBlocks: 0,
      allocatedBytes: 0,
      freeBlocks: 0,
      top: 1024
    })
  })

  it('ignores unknown and repeated frees', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    const a = allocator.allocate(16)
    expect(allocator.free(2000)).to.equal(false)
    expect(allocator.free(a)).to.equal(true)
    expect(allocator.free(a)).to.equal(false)
  })

  it('returns 0 once the heap limit is reached', () => {
    const allocator = new FreeListAllocator(new ArrayMemory(1), options)
    expect(allocator.allocate(3072)).to.equal(1024)
    expect(allocator.allocate(8)).to.equal(0)
  })

  it('grows guest memory when the heap outruns it', () => {
    const memory = new ArrayMemory(1)
    const allocator = new FreeListAllocator(memory, { heapBase: 65528, heapLimit: 0x100000 })
    expect(allocator.allocate(16)).to.equal(65528)
    expect(memory.byteLength).to.equal(131072)
  })

  it('returns 0 when memory cannot grow', () => {
    const memory = new ArrayMemory(1, 1)
    const allocator = new FreeListAllocator(memory, { heapBase: 65528, heapLimit: 0x100000 })
    expect(allocator.allocate(16)).to.equal(0)
    expect(allocator.stats().top).to.equal(65528)
  })

  it('starts at the default heap base', () => {
    const memory = new ArrayMemory(1)
    const allocator = new FreeListAllocator(memory)
    expect(allocator.allocate(16)).to.equal(DEFAULT_HEAP_BASE)
    expect(memory.byteLength).to.equal(17 * 65536)
  })

  it('rejects a limit below the base', () => {
    expect(() => new FreeListAllocator(new ArrayMemory(1), { heapBase: 4096, heapLimit: 1024 })).to.throw(RangeError)
  })
})
