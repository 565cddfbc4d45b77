import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x", { err: new Error("ignored") })).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() returns a logger and remains a no-op", () => {
    const logger = createNullLogger()

    const child = logger.child({ module: "generator" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })

  it("routes every level to the same discarding function", () => {
    const logger = new NullLogger().child({ service: "order-key" }).child({ module: "bisect" })

    expect(logger.trace).toBe(logger.fatal)
    expect(logger.debug).toBe(logger.warn)
    expect(logger.info("x", { operation: "after", keyLength: 2 })).toBeUndefined()
  })
})
