import { OrderKey } from "../core/order-key"
import type { Codec } from "../ports/codec"

/** Raw byte form. Use for binary columns and byte-ordered stores. */
export const orderKeyCodec: Codec<OrderKey> = {
  encode: (key) => key.bytes(),
  decode: (bytes) => OrderKey.fromBytes(bytes),
}

/**
 * ASCII hex form as bytes. For stores that only keep text; byte order of the
 * output still matches key order.
 */
export const hexOrderKeyCodec: Codec<OrderKey> = {
  encode: (key) => Uint8Array.from(Buffer.from(key.toHex(), "latin1")),
  decode: (bytes) => OrderKey.fromHex(Buffer.from(bytes).toString("latin1")),
}
