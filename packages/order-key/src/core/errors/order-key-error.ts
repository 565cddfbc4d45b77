import { BaseError, type ErrorContext } from "./base-error"

export type OrderKeyErrorCode = "ordering_violation" | "decode_failed"

export class OrderKeyError extends BaseError<OrderKeyErrorCode> {
  /**
   * A key was requested strictly between two bounds that are equal or inverted.
   * Bounds are reported as hex.
   */
  static orderingViolation(input: { lower: string; upper: string }): OrderKeyError {
    return new OrderKeyError(
      `Lower bound ${input.lower} must sort strictly before upper bound ${input.upper}`,
      {
        code: "ordering_violation",
        context: { lower: input.lower, upper: input.upper },
      },
    )
  }

  static decodeFailed(reason: string, context: ErrorContext = {}): OrderKeyError {
    return new OrderKeyError(`Cannot decode order key: ${reason}`, {
      code: "decode_failed",
      context: { reason, ...context },
    })
  }
}

export class ConfigError extends BaseError<"invalid_config"> {
  static invalid(message: string, keys: readonly string[], cause?: unknown): ConfigError {
    return new ConfigError(message, {
      code: "invalid_config",
      context: { keys: [...keys] },
      cause,
      isOperational: false,
    })
  }
}

export function isOrderKeyError(
  value: unknown,
  code?: OrderKeyErrorCode,
): value is OrderKeyError {
  if (!(value instanceof OrderKeyError)) return false

  return code === undefined || value.code === code
}
