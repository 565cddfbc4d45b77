import SuperJSON from "superjson"
import { OrderKey } from "../../core/order-key"
import { hex } from "../../tests/utils/keys"
import { registerOrderKey } from "../superjson"

describe("registerOrderKey", () => {
  function instance(stringify?: boolean): SuperJSON {
    const sj = new SuperJSON()
    registerOrderKey(sj, stringify === undefined ? {} : { stringify })

    return sj
  }

  it("writes keys as byte arrays by default", () => {
    const { json } = instance().serialize({ pos: hex("817f80") })

    expect(json).toEqual({ pos: [0x81, 0x7f, 0x80] })
  })

  it("writes keys as hex when stringified", () => {
    const { json } = instance(true).serialize({ pos: hex("817f80") })

    expect(json).toEqual({ pos: "817f80" })
  })

  it("restores OrderKey instances", () => {
    const sj = instance()
    const keys = [OrderKey.default(), hex("817f80")]

    const restored = sj.parse<{ keys: OrderKey[] }>(sj.stringify({ keys }))

    expect(restored.keys.every((k) => k instanceof OrderKey)).toBe(true)
    expect(restored.keys.map((k) => k.toHex())).toEqual(["80", "817f80"])
  })

  it("reads either form regardless of the writer's option", () => {
    const text = instance(true).stringify({ pos: hex("8180") })
    const restored = instance(false).parse<{ pos: OrderKey }>(text)

    expect(restored.pos.equals(hex("8180"))).toBe(true)
  })
})
