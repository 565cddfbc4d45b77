import { z } from "zod"
import { ConfigError } from "../core/errors/order-key-error"
import { envSchema, mapEnvToConfig, type OrderKeyConfig } from "./schema"
import { type ConfigSource, EnvSource, ObjectSource } from "./source"

export type LoadKeyConfigOptions = {
  /** Environment to read `ORDER_KEY_*` variables from. Default: `process.env` */
  env?: Record<string, string | undefined>

  /** Applied last, keyed like the environment variables without prefix. */
  overrides?: Record<string, unknown>

  /** Replaces the env/overrides pair entirely when given. */
  sources?: readonly ConfigSource[]
}

export async function loadKeyConfig(
  options: LoadKeyConfigOptions = {},
): Promise<OrderKeyConfig> {
  const sources = options.sources ?? [
    new EnvSource(options.env ? { env: options.env } : {}),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) {
    const keys = [
      ...new Set(result.error.issues.map((issue) => issue.path.map(String).join("."))),
    ]

    throw ConfigError.invalid(
      `Order key configuration is invalid:\n${z.prettifyError(result.error)}`,
      keys,
      result.error,
    )
  }

  return mapEnvToConfig(result.data)
}
