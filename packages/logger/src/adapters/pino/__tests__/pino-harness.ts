import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger.contract"
import { type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  [LogLevels.Trace]: "trace",
  [LogLevels.Debug]: "debug",
  [LogLevels.Info]: "info",
  [LogLevels.Warn]: "warn",
  [LogLevels.Error]: "error",
  [LogLevels.Fatal]: "fatal",
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk, _, cb) {
          const payload = JSON.parse(chunk.toString())
          const level = pinoLevelToName[Number(payload.level)] ?? "info"

          captured.push({ level, payload })

          cb()
        },
      })

      return {
        logger: new PinoLogger(
          { destination },
          { level: opts?.level ?? "trace", prettify: false },
          {},
        ),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
