/**
 * Assembles small core WebAssembly modules for tests, computing every
 * section and body length so fixtures stay readable.
 */

export const I32 = 0x7f
export const I64 = 0x7e

export const op = {
  unreachable: [0x00],
  drop: [0x1a],
  i32Add: [0x6a],
  i32Eqz: [0x45],
  ifVoid: [0x04, 0x40],
  end: [0x0b],
  i32Const: (value: number): number[] => [0x41, ...sleb(value)],
  localGet: (index: number): number[] => [0x20, ...uleb(index)],
  call: (index: number): number[] => [0x10, ...uleb(index)]
}

export function uleb(value: number): number[] {
  const out: number[] = []
  let rest = value
  do {
    let byte = rest & 0x7f
    rest = Math.floor(rest / 128)
    if (rest !== 0) {
      byte |= 0x80
    }
    out.push(byte)
  } while (rest !== 0)
  return out
}

export function sleb(value: number): number[] {
  const out: number[] = []
  let rest = value
  for (;;) {
    const byte = rest & 0x7f
    rest >>= 7
    const signBitSet = (byte & 0x40) !== 0
    if ((rest === 0 && !signBitSet) || (rest === -1 && signBitSet)) {
      out.push(byte)
      return out
    }
    out.push(byte | 0x80)
  }
}

function name(text: string): number[] {
  const bytes = Array.from(new TextEncoder().encode(text))
  return [...uleb(bytes.length), ...bytes]
}

function vec(items: number[][]): number[] {
  return [...uleb(items.length), ...items.flat()]
}

function section(id: number, payload: number[]): number[] {
  return [id, ...uleb(payload.length), ...payload]
}

export interface ImportDef {
  module: string
  name: string
  params: number[]
  results: number[]
}

export interface FunctionDef {
  export?: string
  params: number[]
  results: number[]
  body: number[][]
}

export interface ModuleDef {
  imports?: ImportDef[]
  functions?: FunctionDef[]
  /** Initial pages of an exported memory */
  memory?: { pages: number; export: string }
  globals?: { export: string; value: number }[]
  data?: { offset: number; bytes: number[] | string }[]
}

export function buildModule(def: ModuleDef): Uint8Array {
  const imports = def.imports ?? []
  const functions = def.functions ?? []
  const globals = def.globals ?? []

  const signatures = [...imports, ...functions].map((fn) => [
    0x60,
    ...vec(fn.params.map((t) => [t])),
    ...vec(fn.results.map((t) => [t]))
  ])

  const bytes: number[] = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]
  bytes.push(...section(1, vec(signatures)))

  if (imports.length > 0) {
    bytes.push(
      ...section(
        2,
        vec(imports.map((imp, i) => [...name(imp.module), ...name(imp.name), 0x00, ...uleb(i)]))
      )
    )
  }

  if (functions.length > 0) {
    bytes.push(...section(3, vec(functions.map((_fn, i) => uleb(imports.length + i)))))
  }

  if (def.memory) {
    bytes.push(...section(5, vec([[0x00, ...uleb(def.memory.pages)]])))
  }

  if (globals.length > 0) {
    bytes.push(...section(6, vec(globals.map((g) => [I32, 0x00, ...op.i32Const(g.value), 0x0b]))))
  }

  const exports: number[][] = []
  functions.forEach((fn, i) => {
    if (fn.export !== undefined) {
      exports.push([...name(fn.export), 0x00, ...uleb(imports.length + i)])
    }
  })
  if (def.memory) {
    exports.push([...name(def.memory.export), 0x02, 0x00])
  }
  globals.forEach((g, i) => {
    exports.push([...name(g.export), 0x03, ...uleb(i)])
  })
  bytes.push(...section(7, vec(exports)))

  if (functions.length > 0) {
    const bodies = functions.map((fn) => {
      const code = [0x00, ...fn.body.flat(), 0x0b]
      return [...uleb(code.length), ...code]
    })
    bytes.push(...section(10, vec(bodies)))
  }

  if (def.data && def.data.length > 0) {
    const segments = def.data.map((segment) => {
      const content =
        typeof segment.bytes === 'string'
          ? Array.from(new TextEncoder().encode(segment.bytes))
          : segment.bytes
      return [0x00, ...op.i32Const(segment.offset), 0x0b, ...uleb(content.length), ...content]
    })
    bytes.push(...section(11, vec(segments)))
  }

  return Uint8Array.from(bytes)
}

/**
 * Exports:
 * - `greet: () -> i32` pointer to "hello" at 16
 * - `noop: () -> ()`, `boom: () -> ()` (traps), `add: (i32, i32) -> i32`
 * - `broken: () -> i32` pointer to invalid UTF-8 at 32
 * - `memory`, global `counter`
 */
export function greeterModule(greeting: string = 'hello'): Uint8Array {
  return buildModule({
    functions: [
      { export: 'greet', params: [], results: [I32], body: [op.i32Const(16)] },
      { export: 'noop', params: [], results: [], body: [] },
      { export: 'boom', params: [], results: [], body: [op.unreachable] },
      {
        export: 'add',
        params: [I32, I32],
        results: [I32],
        body: [op.localGet(0), op.localGet(1), op.i32Add]
      },
      { export: 'broken', params: [], results: [I32], body: [op.i32Const(32)] }
    ],
    memory: { pages: 1, export: 'memory' },
    globals: [{ export: 'counter', value: 7 }],
    data: [
      { offset: 16, bytes: `${greeting}\0` },
      { offset: 32, bytes: [0xc3, 0x28, 0x00] }
    ]
  })
}

/**
 * Imports `hostlink.universal_invoke` and `hostlink.host_malloc`.
 * - `call_echo: () -> i32` invokes "echo" (JSON) with params "hi" at 16,
 *   response at 64, and returns the protocol status
 * - `alloc: () -> i32` returns host_malloc(24)
 */
export function callerModule(): Uint8Array {
  return buildModule({
    imports: [
      {
        module: 'hostlink',
        name: 'universal_invoke',
        params: [I32, I32, I32, I32, I32, I32],
        results: [I32]
      },
      { module: 'hostlink', name: 'host_malloc', params: [I32], results: [I32] }
    ],
    functions: [
      {
        export: 'call_echo',
        params: [],
        results: [I32],
        body: [
          op.i32Const(0),
          op.i32Const(4),
          op.i32Const(0),
          op.i32Const(16),
          op.i32Const(2),
          op.i32Const(64),
          op.call(0)
        ]
      },
      { export: 'alloc', params: [], results: [I32], body: [op.i32Const(24), op.call(1)] }
    ],
    memory: { pages: 1, export: 'memory' },
    data: [
      { offset: 0, bytes: 'echo' },
      { offset: 16, bytes: 'hi' }
    ]
  })
}

/**
 * Reactor whose `_initialize` traps unless `host_malloc(24)` succeeds.
 * `alloc: () -> i32` returns host_malloc(24).
 */
export function initializingModule(): Uint8Array {
  return buildModule({
    imports: [{ module: 'hostlink', name: 'host_malloc', params: [I32], results: [I32] }],
    functions: [
      {
        export: '_initialize',
        params: [],
        results: [],
        body: [op.i32Const(24), op.call(0), op.i32Eqz, op.ifVoid, op.unreachable, op.end]
      },
      { export: 'alloc', params: [], results: [I32], body: [op.i32Const(24), op.call(0)] }
    ],
    memory: { pages: 1, export: 'memory' }
  })
}
