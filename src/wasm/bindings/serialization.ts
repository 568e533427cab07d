/**
 * Serialization formats understood by the invocation protocol.
 *
 * The host only validates the discriminant; the payload encoding is a
 * contract between a handler and the guest calling it.
 */
export enum SerializationFormat {
  Json = 0,
  Bincode = 1,
  Protobuf = 2,
  FlatBuffers = 3
}

export function formatFromDiscriminant(value: number): SerializationFormat | undefined {
  switch (value) {
    case SerializationFormat.Json:
      return SerializationFormat.Json
    case SerializationFormat.Bincode:
      return SerializationFormat.Bincode
    case SerializationFormat.Protobuf:
      return SerializationFormat.Protobuf
    case SerializationFormat.FlatBuffers:
      return SerializationFormat.FlatBuffers
    default:
      return undefined
  }
}

export function formatName(format: SerializationFormat): string {
  return SerializationFormat[format]
}
