import type { DigitStrategy } from "../ports/digit-strategy"
import { bisect } from "./bisect"
import { SENTINEL } from "./constants"
import { OrderKeyError } from "./errors/order-key-error"
import { defaultStrategy } from "./strategies"
import { assertKeyBytes } from "./validate"

const HEX_PATTERN = /^(?:[0-9a-f]{2})+$/

/**
 * Order-maintenance key.
 *
 * Immutable; encoded as content digits followed by a single `0x80` sentinel
 * that never occurs among the content digits. The encoding is prefix-free, so
 * plain unsigned byte comparison of two encodings gives their logical order.
 *
 * @example
 * ```ts
 * const a = OrderKey.default()            // 80
 * const b = OrderKey.newAfter(a)          // 8180
 * const c = OrderKey.newBetween(a, b)     // 817f80
 * [b, c, a].sort(compareOrderKeys)        // a, c, b
 * ```
 */
export class OrderKey {
  private constructor(private readonly encoded: Uint8Array) {}

  /** The canonical reference key: a lone sentinel. */
  static default(): OrderKey {
    return new OrderKey(Uint8Array.of(SENTINEL))
  }

  /**
   * Decodes a key from its byte form. The input is copied.
   *
   * @throws OrderKeyError `decode_failed` when not in self-terminating form.
   */
  static fromBytes(bytes: Uint8Array): OrderKey {
    assertKeyBytes(bytes)

    return new OrderKey(Uint8Array.from(bytes))
  }

  /**
   * Decodes a key from its hex form (two lowercase digits per byte).
   *
   * @throws OrderKeyError `decode_failed`
   */
  static fromHex(hex: string): OrderKey {
    if (!HEX_PATTERN.test(hex)) {
      throw OrderKeyError.decodeFailed("not an even-length lowercase hex string", {
        length: hex.length,
      })
    }

    return OrderKey.fromBytes(Buffer.from(hex, "hex"))
  }

  static newBefore(upper: OrderKey, strategy: DigitStrategy = defaultStrategy): OrderKey {
    return new OrderKey(bisect(null, upper.encoded, strategy))
  }

  static newAfter(lower: OrderKey, strategy: DigitStrategy = defaultStrategy): OrderKey {
    return new OrderKey(bisect(lower.encoded, null, strategy))
  }

  /**
   * @throws OrderKeyError `ordering_violation` unless `lower` sorts strictly before `upper`.
   */
  static newBetween(
    lower: OrderKey,
    upper: OrderKey,
    strategy: DigitStrategy = defaultStrategy,
  ): OrderKey {
    assertOrdered(lower, upper)

    return new OrderKey(bisect(lower.encoded, upper.encoded, strategy))
  }

  /**
   * Generalized constructor. A missing bound leaves that side open; with both
   * missing the result is {@link OrderKey.default}.
   */
  static create(
    before?: OrderKey | null,
    after?: OrderKey | null,
    strategy: DigitStrategy = defaultStrategy,
  ): OrderKey {
    if (before && after) return OrderKey.newBetween(before, after, strategy)
    if (before) return OrderKey.newAfter(before, strategy)
    if (after) return OrderKey.newBefore(after, strategy)

    return OrderKey.default()
  }

  /**
   * Creates `count` ascending keys strictly inside (before, after).
   *
   * Bisects recursively, so key length grows with log2(count) rather than
   * with count as repeated `newAfter` calls would.
   */
  static spread(
    count: number,
    before?: OrderKey | null,
    after?: OrderKey | null,
    strategy: DigitStrategy = defaultStrategy,
  ): OrderKey[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer (got ${count})`)
    }

    if (before && after) assertOrdered(before, after)

    const out: OrderKey[] = []
    OrderKey.fill(out, count, before?.encoded ?? null, after?.encoded ?? null, strategy)

    return out
  }

  private static fill(
    out: OrderKey[],
    count: number,
    lower: Uint8Array | null,
    upper: Uint8Array | null,
    strategy: DigitStrategy,
  ): void {
    if (count === 0) return

    const left = Math.floor((count - 1) / 2)
    const middle = bisect(lower, upper, strategy)

    OrderKey.fill(out, left, lower, middle, strategy)
    out.push(new OrderKey(middle))
    OrderKey.fill(out, count - left - 1, middle, upper, strategy)
  }

  /** Encoded length in bytes, sentinel included. */
  get length(): number {
    return this.encoded.length
  }

  /** A copy of the byte form. */
  bytes(): Uint8Array {
    return Uint8Array.from(this.encoded)
  }

  compare(other: OrderKey): -1 | 0 | 1 {
    const order = Buffer.compare(this.encoded, other.encoded)

    return order < 0 ? -1 : order > 0 ? 1 : 0
  }

  equals(other: OrderKey): boolean {
    return this.compare(other) === 0
  }

  isBefore(other: OrderKey): boolean {
    return this.compare(other) < 0
  }

  isAfter(other: OrderKey): boolean {
    return this.compare(other) > 0
  }

  toHex(): string {
    return Buffer.from(this.encoded).toString("hex")
  }

  toString(): string {
    return this.toHex()
  }

  toJSON(): string {
    return this.toHex()
  }
}

/** Comparator for `Array.prototype.sort`. */
export function compareOrderKeys(a: OrderKey, b: OrderKey): number {
  return a.compare(b)
}

function assertOrdered(lower: OrderKey, upper: OrderKey): void {
  if (!lower.isBefore(upper)) {
    throw OrderKeyError.orderingViolation({
      lower: lower.toHex(),
      upper: upper.toHex(),
    })
  }
}
