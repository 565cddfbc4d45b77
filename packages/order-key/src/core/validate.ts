import { SENTINEL } from "./constants"
import { OrderKeyError } from "./errors/order-key-error"

/**
 * Checks the self-terminating form: content digits other than the sentinel,
 * then exactly one trailing sentinel.
 *
 * @throws OrderKeyError `decode_failed` describing the first violation found.
 */
export function assertKeyBytes(bytes: Uint8Array): void {
  if (bytes.length === 0) {
    throw OrderKeyError.decodeFailed("input is empty", { length: 0 })
  }

  const last = bytes.length - 1

  if (bytes[last] !== SENTINEL) {
    throw OrderKeyError.decodeFailed("missing trailing sentinel", {
      length: bytes.length,
      last: bytes[last],
    })
  }

  const offset = bytes.indexOf(SENTINEL)

  if (offset !== last) {
    throw OrderKeyError.decodeFailed("sentinel inside content digits", {
      length: bytes.length,
      offset,
    })
  }
}

export function isKeyBytes(bytes: Uint8Array): boolean {
  return bytes.length > 0 && bytes.indexOf(SENTINEL) === bytes.length - 1
}
