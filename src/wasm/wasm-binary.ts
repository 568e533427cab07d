/**
 * WASM Binary Inspection
 *
 * Reads just enough of a module binary to describe its exports. The JS
 * WebAssembly API reports export kinds but not function types, and the
 * entry gate needs the signature to pick a calling convention.
 */

import { CompileError } from '../errors'
import {
  ExportDescriptor,
  ExportKind,
  FunctionSignature,
  WasmFormat,
  WasmValueType
} from './types'

const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d]

const SECTION_TYPE = 1
const SECTION_IMPORT = 2
const SECTION_FUNCTION = 3
const SECTION_EXPORT = 7

const VALUE_TYPES: Record<number, WasmValueType> = {
  0x7f: 'i32',
  0x7e: 'i64',
  0x7d: 'f32',
  0x7c: 'f64',
  0x7b: 'v128',
  0x70: 'funcref',
  0x6f: 'externref'
}

const EXPORT_KINDS: ExportKind[] = ['function', 'table', 'memory', 'global', 'tag']

/**
 * Detect the format of a WASM binary by inspecting the magic bytes
 * - Core modules: 0x00 0x61 0x73 0x6D 0x01 0x00 0x00 0x00 (version 1)
 * - Components:   0x00 0x61 0x73 0x6D 0x0d 0x00 0x01 0x00 (version 13, layer 1)
 */
export function detectWasmFormat(bytes: Uint8Array): WasmFormat {
  if (bytes.length < 8) {
    return 'unknown'
  }
  for (let i = 0; i < WASM_MAGIC.length; i++) {
    if (bytes[i] !== WASM_MAGIC[i]) {
      return 'unknown'
    }
  }
  if (bytes[4] === 0x01 && bytes[5] === 0x00 && bytes[6] === 0x00 && bytes[7] === 0x00) {
    return 'core'
  }
  if (bytes[4] === 0x0d && bytes[6] === 0x01) {
    return 'component'
  }
  return 'unknown'
}

class BinaryReader {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true })
  pos: number

  constructor(
    private readonly bytes: Uint8Array,
    start: number = 0
  ) {
    this.pos = start
  }

  get length(): number {
    return this.bytes.length
  }

  u8(): number {
    if (this.pos >= this.bytes.length) {
      throw new Error(`unexpected end of binary at offset ${this.pos}`)
    }
    return this.bytes[this.pos++]
  }

  /** Unsigned LEB128 */
  varuint(): number {
    let result = 0
    let multiplier = 1
    for (let i = 0; i < 10; i++) {
      const byte = this.u8()
      result += (byte & 0x7f) * multiplier
      if ((byte & 0x80) === 0) {
        return result
      }
      multiplier *= 128
    }
    throw new Error(`LEB128 value too long at offset ${this.pos}`)
  }

  take(len: number): Uint8Array {
    if (this.pos + len > this.bytes.length) {
      throw new Error(`unexpected end of binary at offset ${this.pos} (need ${len} bytes)`)
    }
    const slice = this.bytes.subarray(this.pos, this.pos + len)
    this.pos += len
    return slice
  }

  name(): string {
    return this.decoder.decode(this.take(this.varuint()))
  }

  valueType(): WasmValueType {
    const code = this.u8()
    const type = VALUE_TYPES[code]
    if (type === undefined) {
      throw new Error(`unsupported value type 0x${code.toString(16)} at offset ${this.pos - 1}`)
    }
    return type
  }

  limits(): void {
    const flags = this.u8()
    this.varuint()
    if (flags & 0x01) {
      this.varuint()
    }
  }
}

function readTypeSection(reader: BinaryReader): FunctionSignature[] {
  const types: FunctionSignature[] = []
  const count = reader.varuint()
  for (let i = 0; i < count; i++) {
    const form = reader.u8()
    if (form !== 0x60) {
      throw new Error(`unsupported type form 0x${form.toString(16)}`)
    }
    const params: WasmValueType[] = []
    const paramCount = reader.varuint()
    for (let p = 0; p < paramCount; p++) {
      params.push(reader.valueType())
    }
    const results: WasmValueType[] = []
    const resultCount = reader.varuint()
    for (let r = 0; r < resultCount; r++) {
      results.push(reader.valueType())
    }
    types.push({ params, results })
  }
  return types
}

/** Returns the type index of every imported function, in import order */
function readImportSection(reader: BinaryReader): number[] {
  const functionTypes: number[] = []
  const count = reader.varuint()
  for (let i = 0; i < count; i++) {
    reader.name()
    reader.name()
    const kind = reader.u8()
    switch (kind) {
      case 0x00:
        functionTypes.push(reader.varuint())
        break
      case 0x01:
        reader.u8()
        reader.limits()
        break
      case 0x02:
        reader.limits()
        break
      case 0x03:
        reader.valueType()
        reader.u8()
        break
      case 0x04:
        reader.u8()
        reader.varuint()
        break
      default:
        throw new Error(`unknown import kind 0x${kind.toString(16)}`)
    }
  }
  return functionTypes
}

function readFunctionSection(reader: BinaryReader): number[] {
  const typeIndices: number[] = []
  const count = reader.varuint()
  for (let i = 0; i < count; i++) {
    typeIndices.push(reader.varuint())
  }
  return typeIndices
}

interface RawExport {
  name: string
  kind: ExportKind
  index: number
}

function readExportSection(reader: BinaryReader): RawExport[] {
  const exports: RawExport[] = []
  const count = reader.varuint()
  for (let i = 0; i < count; i++) {
    const name = reader.name()
    const kindCode = reader.u8()
    const kind = EXPORT_KINDS[kindCode]
    if (kind === undefined) {
      throw new Error(`unknown export kind 0x${kindCode.toString(16)} for '${name}'`)
    }
    exports.push({ name, kind, index: reader.varuint() })
  }
  return exports
}

/**
 * Describe the exports of a core module binary, including the signature
 * of every exported function.
 */
export function inspectModule(bytes: Uint8Array, path: string = '<memory>'): ExportDescriptor[] {
  const format = detectWasmFormat(bytes)
  if (format !== 'core') {
    throw new CompileError(path, `not a core WebAssembly module (format: ${format})`)
  }

  let types: FunctionSignature[] = []
  let importedFunctions: number[] = []
  let definedFunctions: number[] = []
  let rawExports: RawExport[] = []

  try {
    const reader = new BinaryReader(bytes, 8)
    while (reader.pos < reader.length) {
      const id = reader.u8()
      const size = reader.varuint()
      const section = new BinaryReader(reader.take(size))
      switch (id) {
        case SECTION_TYPE:
          types = readTypeSection(section)
          break
        case SECTION_IMPORT:
          importedFunctions = readImportSection(section)
          break
        case SECTION_FUNCTION:
          definedFunctions = readFunctionSection(section)
          break
        case SECTION_EXPORT:
          rawExports = readExportSection(section)
          break
        default:
          break
      }
    }
  } catch (error) {
    throw new CompileError(path, error instanceof Error ? error.message : String(error), error)
  }

  const functionTypes = [...importedFunctions, ...definedFunctions]
  return rawExports.map((raw) => {
    if (raw.kind !== 'function') {
      return { name: raw.name, kind: raw.kind }
    }
    const typeIndex = functionTypes[raw.index]
    const signature = typeIndex === undefined ? undefined : types[typeIndex]
    if (signature === undefined) {
      throw new CompileError(path, `export '${raw.name}' refers to unknown function ${raw.index}`)
    }
    return { name: raw.name, kind: raw.kind, signature }
  })
}

export function formatSignature(signature: FunctionSignature): string {
  const results =
    signature.results.length === 1
      ? signature.results[0]
      : `(${signature.results.join(', ')})`
  return `(${signature.params.join(', ')}) -> ${results}`
}
