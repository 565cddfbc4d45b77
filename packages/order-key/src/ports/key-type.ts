/**
 * Recognizes and parses keys where data crosses a boundary (DB rows, JSON
 * payloads, messages from other replicas).
 */
export interface KeyType<T> {
  /** Name used in error messages and debugging */
  readonly kind: string

  /**
   * Parse and validate unknown input.
   * @throws Implementation-defined error if validation fails
   */
  parse(value: unknown): T

  /** Type guard for non-throwing validation */
  is(value: unknown): value is T
}
