import type { DigitStrategy } from "../../ports/digit-strategy"
import { midpointOf } from "./sentinel"

/**
 * Always splits the gap in half, treating a missing bound as the implicit
 * extreme. Leaves the most room on both sides of every new key.
 */
export function midpoint(): DigitStrategy {
  return {
    name: "midpoint",
    pick: midpointOf,
  }
}
