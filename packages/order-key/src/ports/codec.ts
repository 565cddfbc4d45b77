/**
 * Bidirectional transform between a typed value `T` and bytes.
 *
 * @remarks
 * Codecs sit between typed key usage and byte-oriented stores or columns.
 * They must be pure and deterministic; a store treats their output as opaque.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /**
   * @throws when `bytes` is not a valid encoding of `T`.
   */
  decode(bytes: Uint8Array): T
}
