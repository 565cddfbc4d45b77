import { OrderKey } from "../core/order-key"
import type { KeyType } from "../ports/key-type"
import { fromStructured } from "./structured"

export const OrderKeyType: KeyType<OrderKey> = {
  kind: "OrderKey",
  is: (value): value is OrderKey => value instanceof OrderKey,
  parse: (value) => fromStructured(value),
}
