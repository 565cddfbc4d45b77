import { MAX_DIGIT, MIN_DIGIT } from "../core/constants"
import { OrderKeyError } from "../core/errors/order-key-error"
import { OrderKey } from "../core/order-key"

export type StructuredOptions = {
  /**
   * Embed the hex form instead of raw bytes, for text-only formats.
   * @default false
   */
  stringify?: boolean
}

/** Byte values, or the hex form when stringified. Both survive `JSON.stringify`. */
export type StructuredKey = number[] | string

export function toStructured(key: OrderKey, opts: StructuredOptions = {}): StructuredKey {
  return opts.stringify ? key.toHex() : Array.from(key.bytes())
}

function isByteArray(value: readonly unknown[]): value is readonly number[] {
  return value.every(
    (v) => typeof v === "number" && Number.isInteger(v) && v >= MIN_DIGIT && v <= MAX_DIGIT,
  )
}

/**
 * Reads a key embedded in a structured document.
 *
 * Accepts either external form: raw bytes (a `Uint8Array`, or the array of
 * byte values `toStructured` writes) or a hex string.
 *
 * @throws OrderKeyError `decode_failed`
 */
export function fromStructured(value: unknown): OrderKey {
  if (value instanceof OrderKey) return value
  if (typeof value === "string") return OrderKey.fromHex(value)
  if (value instanceof Uint8Array) return OrderKey.fromBytes(value)

  if (Array.isArray(value)) {
    const items: readonly unknown[] = value
    if (!isByteArray(items)) {
      throw OrderKeyError.decodeFailed("array contains values that are not bytes", {
        length: items.length,
      })
    }

    return OrderKey.fromBytes(Uint8Array.from(items))
  }

  throw OrderKeyError.decodeFailed("unsupported structured value", {
    type: value === null ? "null" : typeof value,
  })
}
