import { DIGIT_CEILING, DIGIT_FLOOR, SENTINEL } from "../../core/constants"
import type { DigitStrategy } from "../digit-strategy"

function hasRoom(low: number, high: number): boolean {
  for (let d = low + 1; d < high; d++) {
    if (d !== SENTINEL) return true
  }

  return false
}

/**
 * Gaps the bisector can hand a strategy: any pair of virtual digits with a
 * non-sentinel digit strictly between them.
 */
function* gaps(): Generator<[number, number]> {
  for (let low = DIGIT_FLOOR; low < DIGIT_CEILING; low++) {
    for (let high = low + 2; high <= DIGIT_CEILING; high++) {
      if (hasRoom(low, high)) yield [low, high]
    }
  }
}

export function describeDigitStrategyContract(name: string, make: () => DigitStrategy) {
  describe(`${name} (DigitStrategy contract)`, () => {
    it("has a name", () => {
      expect(make().name).toMatch(/\S/)
    })

    it("picks an integer strictly inside every gap with room", () => {
      const strategy = make()
      const bad: Array<[number, number, number]> = []

      for (const [low, high] of gaps()) {
        const d = strategy.pick(low, high)

        if (!Number.isInteger(d) || d <= low || d >= high) bad.push([low, high, d])
      }

      expect(bad).toEqual([])
    })

    it("never picks the sentinel", () => {
      const strategy = make()
      const bad: Array<[number, number]> = []

      for (const [low, high] of gaps()) {
        if (strategy.pick(low, high) === SENTINEL) bad.push([low, high])
      }

      expect(bad).toEqual([])
    })

    it("is deterministic", () => {
      const a = make()
      const b = make()

      for (const [low, high] of [
        [DIGIT_FLOOR, DIGIT_CEILING],
        [DIGIT_FLOOR, SENTINEL],
        [SENTINEL, DIGIT_CEILING],
        [0x10, 0x20],
      ]) {
        expect(a.pick(low, high)).toBe(b.pick(low, high))
      }
    })
  })
}
