import { type LogLevelName, logLevelNames } from "@lexkey/logger"
import { z } from "zod"
import { type StrategyName, strategyNames } from "../core/strategies"

export const envSchema = z.object({
  STRATEGY: z.enum(strategyNames).default("step"),
  WARN_LENGTH: z.coerce.number().int().positive().default(64),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
  SERVICE_NAME: z.string().min(1).default("order-key"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type OrderKeyConfig = {
  strategy: StrategyName

  /** Byte length above which generated keys are reported. */
  warnLength: number

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

export function mapEnvToConfig(env: EnvConfig): OrderKeyConfig {
  return {
    strategy: env.STRATEGY,
    warnLength: env.WARN_LENGTH,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}
