import type { DigitStrategy } from "../../ports/digit-strategy"
import { DIGIT_CEILING, DIGIT_FLOOR } from "../constants"
import { avoidSentinel, midpointOf } from "./sentinel"

/**
 * One-sided gaps take the digit adjacent to the known bound; two-sided gaps
 * take the midpoint.
 *
 * Appending after the default key yields `81 80`, `82 80`, ... so a run of
 * appends grows by one byte only every 127 insertions.
 */
export function step(): DigitStrategy {
  return {
    name: "step",
    pick(low: number, high: number): number {
      if (high === DIGIT_CEILING) return avoidSentinel(low + 1, low, high)
      if (low === DIGIT_FLOOR) return avoidSentinel(high - 1, low, high)

      return midpointOf(low, high)
    },
  }
}
