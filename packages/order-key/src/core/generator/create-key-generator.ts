import { createNullLogger, type Logger } from "@lexkey/logger"
import type { DigitStrategy } from "../../ports/digit-strategy"
import type { KeyGenerator } from "../../ports/key-generator"
import { OrderKey } from "../order-key"
import { defaultStrategy } from "../strategies"

export type KeyGeneratorDeps = {
  logger?: Logger
}

export type KeyGeneratorOptions = {
  strategy?: DigitStrategy

  /**
   * Keys longer than this many bytes are reported at warn level. Long keys
   * come from many insertions into the same tight gap.
   */
  warnLength?: number
}

export class OrderKeyGenerator implements KeyGenerator {
  private readonly logger: Logger
  private readonly strategy: DigitStrategy
  private readonly warnLength: number | undefined

  public constructor(deps: KeyGeneratorDeps = {}, opts: KeyGeneratorOptions = {}) {
    if (opts.warnLength !== undefined && !(opts.warnLength > 0)) {
      throw new RangeError(`warnLength must be > 0 (got ${opts.warnLength})`)
    }

    this.strategy = opts.strategy ?? defaultStrategy
    this.warnLength = opts.warnLength
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "order-key" })
  }

  first(): OrderKey {
    return this.observe("first", OrderKey.default())
  }

  before(upper: OrderKey): OrderKey {
    return this.observe("before", OrderKey.newBefore(upper, this.strategy))
  }

  after(lower: OrderKey): OrderKey {
    return this.observe("after", OrderKey.newAfter(lower, this.strategy))
  }

  between(lower: OrderKey, upper: OrderKey): OrderKey {
    const key = this.guard("between", () =>
      OrderKey.newBetween(lower, upper, this.strategy),
    )

    return this.observe("between", key)
  }

  create(before?: OrderKey | null, after?: OrderKey | null): OrderKey {
    const key = this.guard("create", () => OrderKey.create(before, after, this.strategy))

    return this.observe("create", key)
  }

  spread(count: number, before?: OrderKey | null, after?: OrderKey | null): OrderKey[] {
    const keys = this.guard("spread", () =>
      OrderKey.spread(count, before, after, this.strategy),
    )

    const longest = keys.reduce((max, key) => Math.max(max, key.length), 0)
    this.logger.trace("Generated order keys", {
      operation: "spread",
      count: keys.length,
      keyLength: longest,
    })
    this.checkLength("spread", longest)

    return keys
  }

  private guard<T>(operation: string, build: () => T): T {
    try {
      return build()
    } catch (err) {
      this.logger.debug("Rejected order key bounds", { operation, err })
      throw err
    }
  }

  private observe(operation: string, key: OrderKey): OrderKey {
    this.logger.trace("Generated order key", { operation, keyLength: key.length })
    this.checkLength(operation, key.length)

    return key
  }

  private checkLength(operation: string, keyLength: number): void {
    if (this.warnLength === undefined || keyLength <= this.warnLength) return

    this.logger.warn("Order key exceeds length threshold", {
      operation,
      keyLength,
      threshold: this.warnLength,
    })
  }
}

export function createKeyGenerator(
  deps: KeyGeneratorDeps = {},
  opts: KeyGeneratorOptions = {},
): KeyGenerator {
  return new OrderKeyGenerator(deps, opts)
}
