import type SuperJSON from "superjson"
import { OrderKey } from "../core/order-key"
import {
  fromStructured,
  type StructuredKey,
  type StructuredOptions,
  toStructured,
} from "./structured"

export const SUPERJSON_TYPE_NAME = "OrderKey"

/**
 * Teaches a superjson instance to carry `OrderKey` values.
 *
 * Keys travel as an array of byte values by default, or as hex with
 * `stringify`. Either form decodes back to an equal key, so readers do not
 * need to know which option the writer used.
 *
 * @example
 * ```ts
 * const sj = new SuperJSON()
 * registerOrderKey(sj, { stringify: true })
 * sj.parse<{ pos: OrderKey }>(sj.stringify({ pos: OrderKey.default() }))
 * ```
 */
export function registerOrderKey(
  target: Pick<SuperJSON, "registerCustom">,
  opts: StructuredOptions = {},
): void {
  target.registerCustom<OrderKey, StructuredKey>(
    {
      isApplicable: (v): v is OrderKey => v instanceof OrderKey,
      serialize: (key) => toStructured(key, opts),
      deserialize: (value) => fromStructured(value),
    },
    SUPERJSON_TYPE_NAME,
  )
}
