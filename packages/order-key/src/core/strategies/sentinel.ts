import { SENTINEL } from "../constants"

/**
 * Moves a candidate that landed on the sentinel to a neighbour inside (low, high).
 * Callers guarantee the gap holds a non-sentinel digit.
 */
export function avoidSentinel(candidate: number, low: number, high: number): number {
  if (candidate !== SENTINEL) return candidate

  if (SENTINEL - 1 > low) return SENTINEL - 1
  if (SENTINEL + 1 < high) return SENTINEL + 1

  return candidate
}

export function midpointOf(low: number, high: number): number {
  return avoidSentinel(Math.floor((low + high) / 2), low, high)
}
