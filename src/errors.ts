/**
 * Error taxonomy
 *
 * Every failure surfaced by the runtime is a HostlinkError subclass with a
 * stable `code` and the context needed to explain it (module path, export
 * name, permitted set, underlying cause).
 */

export type HostlinkErrorCode =
  | 'IO_ERROR'
  | 'COMPILE_ERROR'
  | 'INSTANTIATION_ERROR'
  | 'EXPORT_NOT_FOUND'
  | 'EXPORT_NOT_CALLABLE'
  | 'SIGNATURE_MISMATCH'
  | 'AUTHORIZATION_ERROR'
  | 'PROTOCOL_ERROR'
  | 'MEMORY_ACCESS_ERROR'
  | 'HANDLER_ERROR'
  | 'GUEST_TRAP'
  | 'CONFIG_ERROR'

export class HostlinkError extends Error {
  readonly code: HostlinkErrorCode

  constructor(code: HostlinkErrorCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined)
    this.name = new.target.name
    this.code = code
    Error.captureStackTrace(this, new.target)
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

export class IoError extends HostlinkError {
  constructor(
    readonly path: string,
    action: string,
    cause?: unknown
  ) {
    super(
      'IO_ERROR',
      `Failed to ${action} '${path}'${cause !== undefined ? `: ${describeCause(cause)}` : ''}`,
      cause
    )
  }
}

export class CompileError extends HostlinkError {
  constructor(
    readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super('COMPILE_ERROR', `Failed to compile guest module '${path}': ${detail}`, cause)
  }
}

export class InstantiationError extends HostlinkError {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(
      'INSTANTIATION_ERROR',
      `Failed to instantiate guest module '${path}': ${describeCause(cause)}`,
      cause
    )
  }
}

export class ExportNotFoundError extends HostlinkError {
  constructor(
    readonly path: string,
    readonly exportName: string
  ) {
    super('EXPORT_NOT_FOUND', `Export '${exportName}' not found in guest module '${path}'`)
  }
}

export class ExportNotCallableError extends HostlinkError {
  constructor(
    readonly path: string,
    readonly exportName: string,
    readonly kind: string
  ) {
    super(
      'EXPORT_NOT_CALLABLE',
      `Export '${exportName}' in guest module '${path}' is a ${kind}, not a function`
    )
  }
}

export class SignatureMismatchError extends HostlinkError {
  constructor(
    readonly path: string,
    readonly exportName: string,
    readonly signature: string
  ) {
    super(
      'SIGNATURE_MISMATCH',
      `Cannot call function '${exportName}' in guest module '${path}': incompatible signature ${signature} ` +
        `(expected () -> i32 or () -> ())`
    )
  }
}

export class AuthorizationError extends HostlinkError {
  constructor(
    readonly path: string,
    readonly functionName: string,
    readonly allowed: ReadonlyArray<string>
  ) {
    super(
      'AUTHORIZATION_ERROR',
      `Function '${functionName}' is not configured as an entry function for guest module '${path}'. ` +
        `Allowed functions: ${JSON.stringify(allowed)}`
    )
  }
}

export class ProtocolError extends HostlinkError {
  constructor(message: string, cause?: unknown) {
    super('PROTOCOL_ERROR', message, cause)
  }
}

export class MemoryAccessError extends HostlinkError {
  constructor(
    readonly offset: number,
    readonly length: number,
    readonly byteLength: number
  ) {
    super(
      'MEMORY_ACCESS_ERROR',
      `Guest memory access out of bounds: offset=${offset} length=${length} memory=${byteLength} bytes`
    )
  }
}

export class HandlerError extends HostlinkError {
  constructor(
    readonly method: string,
    message: string,
    cause?: unknown
  ) {
    super('HANDLER_ERROR', message, cause)
  }
}

export class UnsupportedFormatError extends HandlerError {
  constructor(
    method: string,
    readonly format: string
  ) {
    super(method, `Format ${format} not supported for ${method} method`)
  }
}

export class GuestTrapError extends HostlinkError {
  constructor(
    readonly path: string,
    readonly exportName: string,
    cause: unknown
  ) {
    super(
      'GUEST_TRAP',
      `Guest function '${exportName}' in '${path}' failed: ${describeCause(cause)}`,
      cause
    )
  }
}

export class ConfigError extends HostlinkError {
  constructor(
    readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super('CONFIG_ERROR', `Invalid configuration '${path}': ${detail}`, cause)
  }
}
