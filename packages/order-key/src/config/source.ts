/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen downstream in the schema.
 * Sources are applied in order and later ones override earlier ones.
 */
export interface ConfigSource {
  /** Name used for provenance, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}

export type EnvSourceOptions = {
  /** Only variables with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export const DEFAULT_ENV_PREFIX = "ORDER_KEY_"

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined && key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}

export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
