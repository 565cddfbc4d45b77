export { hexOrderKeyCodec, orderKeyCodec } from "./adapters/bytes-codec"
export { fromColumn, toColumn, toNullableColumn } from "./adapters/column"
export { OrderKeyType } from "./adapters/key-type"
export {
  fromStructured,
  type StructuredKey,
  type StructuredOptions,
  toStructured,
} from "./adapters/structured"
export { registerOrderKey, SUPERJSON_TYPE_NAME } from "./adapters/superjson"
export {
  createConfiguredLogger,
  createKeyGeneratorFromConfig,
} from "./config/create-from-config"
export { type LoadKeyConfigOptions, loadKeyConfig } from "./config/load-key-config"
export { type EnvConfig, envSchema, type OrderKeyConfig } from "./config/schema"
export {
  type ConfigSource,
  DEFAULT_ENV_PREFIX,
  EnvSource,
  type EnvSourceOptions,
  ObjectSource,
} from "./config/source"
export { DIGIT_CEILING, DIGIT_FLOOR, MAX_DIGIT, MIN_DIGIT, SENTINEL } from "./core/constants"
export {
  BaseError,
  type BaseErrorOptions,
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
  type SerializeOptions,
  serializeError,
} from "./core/errors/base-error"
export {
  ConfigError,
  isOrderKeyError,
  OrderKeyError,
  type OrderKeyErrorCode,
} from "./core/errors/order-key-error"
export {
  createKeyGenerator,
  type KeyGeneratorDeps,
  type KeyGeneratorOptions,
  OrderKeyGenerator,
} from "./core/generator/create-key-generator"
export { compareOrderKeys, OrderKey } from "./core/order-key"
export {
  defaultStrategy,
  midpoint,
  resolveStrategy,
  type StrategyName,
  step,
  strategyNames,
} from "./core/strategies"
export { assertKeyBytes, isKeyBytes } from "./core/validate"
export type { Codec } from "./ports/codec"
export type { DigitStrategy } from "./ports/digit-strategy"
export type { KeyGenerator } from "./ports/key-generator"
export type { KeyType } from "./ports/key-type"
