import { OrderKey } from "../core/order-key"

/** Binds a key as an opaque binary column value (e.g. `bytea`, `BLOB`). */
export function toColumn(key: OrderKey): Buffer {
  return Buffer.from(key.bytes())
}

export function toNullableColumn(key: OrderKey | null | undefined): Buffer | null {
  return key ? toColumn(key) : null
}

/**
 * Reads a key back from a binary column. SQL `NULL` stays `null`.
 *
 * @throws OrderKeyError `decode_failed` for a non-null value that is not a key.
 */
export function fromColumn(value: Uint8Array | null | undefined): OrderKey | null {
  if (value === null || value === undefined) return null

  return OrderKey.fromBytes(value)
}
