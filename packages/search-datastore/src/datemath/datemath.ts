/**
 * @file Date Math Translation
 *
 * Callers build relative dates from a symbolic vocabulary (`store.now`,
 * `store.day`, ...). `toNativeDateMath` rewrites such an expression into the
 * engine's date-math syntax, e.g. `2024-01-01TZ-1d` becomes
 * `2024-01-01TZ||-1d`.
 */

// =============================================================================
// Vocabulary
// =============================================================================

/**
 * Symbolic date vocabulary exposed to callers.
 */
export const DATE_FORMAT = {
  NOW: 'now',
  YEAR: 'y',
  MONTH: 'M',
  WEEK: 'w',
  DAY: 'd',
  HOUR: 'h',
  MINUTE: 'm',
  SECOND: 's',
  MILLISECOND: 'ms',
  MICROSECOND: 'micros',
  NANOSECOND: 'nanos',
  SEPARATOR: '||',
  DATE_END: 'Z',
} as const

/**
 * Native date-math token for each translated symbol.
 */
export const DATEMATH_MAP = {
  NOW: 'now',
  YEAR: 'y',
  MONTH: 'M',
  WEEK: 'w',
  DAY: 'd',
  HOUR: 'h',
  MINUTE: 'm',
  SECOND: 's',
  DATE_END: 'Z||',
} as const

export type DateMathSymbol = keyof typeof DATEMATH_MAP

/**
 * Replacement order. Some symbols are substrings of others (`m` and `ms`,
 * `Z` and `Z||`), so the order is fixed.
 */
const REPLACEMENT_ORDER: readonly DateMathSymbol[] = [
  'NOW',
  'YEAR',
  'MONTH',
  'WEEK',
  'DAY',
  'HOUR',
  'MINUTE',
  'SECOND',
  'DATE_END',
]

// =============================================================================
// Translation
// =============================================================================

/**
 * Translate a symbolic date expression to native date math.
 *
 * A single left-to-right pass of substring replacements; no parsing and no
 * escaping.
 */
export function toNativeDateMath(value: string): string {
  let out = value
  for (const symbol of REPLACEMENT_ORDER) {
    out = out.split(DATE_FORMAT[symbol]).join(DATEMATH_MAP[symbol])
  }
  return out
}
