import { hex } from "../../tests/utils/keys"
import { fromColumn, toColumn, toNullableColumn } from "../column"

describe("column adapters", () => {
  it("binds keys as buffers", () => {
    const value = toColumn(hex("817f80"))

    expect(Buffer.isBuffer(value)).toBe(true)
    expect(value.toString("hex")).toBe("817f80")
  })

  it("keeps SQL NULL", () => {
    expect(toNullableColumn(null)).toBeNull()
    expect(toNullableColumn(undefined)).toBeNull()
    expect(fromColumn(null)).toBeNull()
    expect(fromColumn(undefined)).toBeNull()
  })

  it("reads keys back", () => {
    expect(fromColumn(Buffer.from("8180", "hex"))?.toHex()).toBe("8180")
    expect(toNullableColumn(hex("80"))?.toString("hex")).toBe("80")
  })

  it("sorts bound values like keys", () => {
    const values = ["8180", "0080", "80", "817f80"].map((h) => toColumn(hex(h)))

    expect(values.sort(Buffer.compare).map((b) => b.toString("hex"))).toEqual([
      "0080",
      "80",
      "817f80",
      "8180",
    ])
  })

  it("rejects stored bytes that are not a key", () => {
    expect(() => fromColumn(Buffer.from("8080", "hex"))).toThrow(
      "sentinel inside content digits",
    )
  })
})
