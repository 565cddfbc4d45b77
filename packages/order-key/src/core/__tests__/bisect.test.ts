import type { DigitStrategy } from "../../ports/digit-strategy"
import { bisect } from "../bisect"
import { step } from "../strategies"

const bytes = (...values: number[]) => Uint8Array.of(...values)

const fixed = (digit: number): DigitStrategy => ({
  name: "fixed",
  pick: () => digit,
})

describe("bisect", () => {
  it("returns the lone sentinel without bounds", () => {
    expect(bisect(null, null, step())).toEqual(bytes(0x80))
  })

  it("hands the strategy the virtual floor and ceiling for open sides", () => {
    const calls: Array<[number, number]> = []
    const spy: DigitStrategy = {
      name: "spy",
      pick(low, high) {
        calls.push([low, high])
        return 0x40
      },
    }

    bisect(null, bytes(0x80), spy)
    bisect(bytes(0x20, 0x80), null, spy)

    expect(calls).toEqual([
      [-1, 0x80],
      [0x20, 256],
    ])
  })

  it("shows an ended bound as its sentinel", () => {
    const calls: Array<[number, number]> = []
    const spy: DigitStrategy = {
      name: "spy",
      pick(low, high) {
        calls.push([low, high])
        return low + 1
      },
    }

    // 10 80 < 10 90 80: position 1 compares 0x80 against 0x90
    expect(bisect(bytes(0x10, 0x80), bytes(0x10, 0x90, 0x80), spy)).toEqual(
      bytes(0x10, 0x81, 0x80),
    )
    expect(calls).toEqual([[0x80, 0x90]])
  })

  it("follows the upper bound once the lower one has ended in a tight gap", () => {
    // 10 80 < 10 81 80: nothing fits between 0x80 and 0x81 at position 1
    expect(bisect(bytes(0x10, 0x80), bytes(0x10, 0x81, 0x80), step())).toEqual(
      bytes(0x10, 0x81, 0x7f, 0x80),
    )
  })

  it("never asks the strategy to fill a gap whose only digit is the sentinel", () => {
    const strategy: DigitStrategy = {
      name: "strict",
      pick(low, high) {
        expect(high - low === 2 && low + 1 === 0x80).toBe(false)
        return step().pick(low, high)
      },
    }

    expect(bisect(bytes(0x7f, 0x80), bytes(0x81, 0x80), strategy)).toEqual(
      bytes(0x7f, 0x81, 0x80),
    )
  })

  it.each([
    ["below the gap", 0x60],
    ["on the lower bound", 0x70],
    ["above the gap", 0xa0],
    ["on the sentinel", 0x80],
    ["not an integer", 0x78 + 0.5],
  ])("rejects a digit %s", (_label, digit) => {
    const strategy = fixed(digit)

    expect(() => bisect(bytes(0x70, 0x80), bytes(0x90, 0x80), strategy)).toThrow(RangeError)
  })

  it("names the strategy and the gap when rejecting a digit", () => {
    expect(() => bisect(bytes(0x10, 0x80), bytes(0x20, 0x80), fixed(0x30))).toThrow(
      'Digit strategy "fixed" picked 48 outside the gap (16, 32)',
    )
  })
})
