import type { OrderKey } from "../core/order-key"

/**
 * Produces keys with a fixed digit strategy and reports on what it produces.
 *
 * Every method has the ordering guarantees of the matching `OrderKey` static.
 */
export interface KeyGenerator {
  first(): OrderKey
  before(upper: OrderKey): OrderKey
  after(lower: OrderKey): OrderKey
  between(lower: OrderKey, upper: OrderKey): OrderKey
  create(before?: OrderKey | null, after?: OrderKey | null): OrderKey
  spread(count: number, before?: OrderKey | null, after?: OrderKey | null): OrderKey[]
}
