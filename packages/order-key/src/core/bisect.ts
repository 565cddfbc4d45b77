import type { DigitStrategy } from "../ports/digit-strategy"
import { DIGIT_CEILING, DIGIT_FLOOR, SENTINEL } from "./constants"

/** True when some digit other than the sentinel lies strictly inside (low, high). */
function hasRoom(low: number, high: number): boolean {
  const width = high - low

  return width > 2 || (width === 2 && low + 1 !== SENTINEL)
}

function pickDigit(strategy: DigitStrategy, low: number, high: number): number {
  const digit = strategy.pick(low, high)

  if (!Number.isInteger(digit) || digit <= low || digit >= high || digit === SENTINEL) {
    throw new RangeError(
      `Digit strategy "${strategy.name}" picked ${digit} outside the gap (${low}, ${high})`,
    )
  }

  return digit
}

/**
 * Builds the encoded bytes of a key strictly between `lower` and `upper`.
 *
 * Both bounds are encoded keys (sentinel included); `null` leaves that side
 * open. Callers must have checked `lower < upper`.
 *
 * Walks both bounds position by position. A bound that has run out of content
 * shows its sentinel at that position. Equal digits are copied. A gap with
 * room gets one digit from the strategy and the key ends there. A tight gap
 * copies one side's digit, after which the other side no longer constrains
 * the result, and the walk continues one position deeper.
 */
export function bisect(
  lower: Uint8Array | null,
  upper: Uint8Array | null,
  strategy: DigitStrategy,
): Uint8Array {
  if (lower === null && upper === null) return Uint8Array.of(SENTINEL)

  const out: number[] = []
  let lo = lower
  let hi = upper

  for (let i = 0; ; i++) {
    const low = lo === null ? DIGIT_FLOOR : lo[i]
    const high = hi === null ? DIGIT_CEILING : hi[i]

    if (low === high) {
      out.push(low)
      continue
    }

    if (hasRoom(low, high)) {
      out.push(pickDigit(strategy, low, high), SENTINEL)

      return Uint8Array.from(out)
    }

    if (lo !== null && low !== SENTINEL) {
      // Below `high` from here on; only the lower bound's tail still matters.
      out.push(low)
      hi = null
    } else {
      // `low` is open or `lo` has ended, so `high` is a real content digit.
      out.push(high)
      lo = null
    }
  }
}
