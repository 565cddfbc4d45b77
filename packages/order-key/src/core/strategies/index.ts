import type { DigitStrategy } from "../../ports/digit-strategy"
import { midpoint } from "./midpoint"
import { step } from "./step"

export const strategyNames = ["step", "midpoint"] as const

export type StrategyName = (typeof strategyNames)[number]

export const defaultStrategy: DigitStrategy = step()

export function resolveStrategy(name: StrategyName): DigitStrategy {
  switch (name) {
    case "step":
      return step()
    case "midpoint":
      return midpoint()
  }
}

export { midpoint, step }
