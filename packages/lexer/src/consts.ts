/**
 * Lexer Constants
 */

export const ROOT_STATE = 'root'

/** Flags every rule pattern is compiled with: `m` for line anchors, `y` to match in place */
export const PATTERN_FLAGS = 'my'

/**
 * Zero-width matches that only move the state stack count as progress, up to
 * this many in a row at one position. Past that the position is treated as
 * unmatched.
 */
export const MAX_ZERO_WIDTH_TRANSITIONS = 64
