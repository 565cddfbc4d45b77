/**
 * Chooses the content digit emitted when a gap has room.
 *
 * @remarks
 * `low` and `high` are the virtual digits bounding the gap at the current
 * position. `low` is `DIGIT_FLOOR` when nothing bounds the key from below and
 * `high` is `DIGIT_CEILING` when nothing bounds it from above. A bound whose
 * content has ended contributes the sentinel.
 *
 * Implementations must return an integer `d` with `low < d < high` and
 * `d !== SENTINEL`. The bisector only calls `pick` when such a digit exists,
 * and rejects any other answer with a `RangeError`.
 *
 * The choice affects average key length under skewed workloads, never order.
 */
export interface DigitStrategy {
  readonly name: string

  pick(low: number, high: number): number
}
