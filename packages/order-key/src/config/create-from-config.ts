import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@lexkey/logger"
import { createKeyGenerator } from "../core/generator/create-key-generator"
import { resolveStrategy } from "../core/strategies"
import type { KeyGenerator } from "../ports/key-generator"
import type { OrderKeyConfig } from "./schema"

export function createConfiguredLogger(
  config: OrderKeyConfig,
  deps: PinoLoggerDeps = {},
): Logger {
  return createPinoLogger(
    deps,
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName },
  )
}

/**
 * Wires a generator from loaded configuration. Pass `logger` to reuse an
 * existing one, or `destination` to redirect the pino output.
 */
export function createKeyGeneratorFromConfig(
  config: OrderKeyConfig,
  deps: PinoLoggerDeps & { logger?: Logger } = {},
): KeyGenerator {
  const { logger, ...pinoDeps } = deps

  return createKeyGenerator(
    { logger: logger ?? createConfiguredLogger(config, pinoDeps) },
    { strategy: resolveStrategy(config.strategy), warnLength: config.warnLength },
  )
}
