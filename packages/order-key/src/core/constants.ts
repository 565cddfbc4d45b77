/** Terminates every key; never a content digit. */
export const SENTINEL = 0x80

export const MIN_DIGIT = 0x00
export const MAX_DIGIT = 0xff

/** Virtual digit for an unbounded lower side of a gap. */
export const DIGIT_FLOOR = MIN_DIGIT - 1

/** Virtual digit for an unbounded upper side of a gap. */
export const DIGIT_CEILING = MAX_DIGIT + 1
