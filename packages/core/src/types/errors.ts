/**
 * Error codes for matcher construction and processing failures.
 * @public
 */
export type MatcherErrorCode =
  | 'EMPTY_PATTERN' // Empty pattern under emptyPatterns: 'reject'
  | 'HIT_MODE_REQUIRES_REPLACE' // HitMode.None without replace
  | 'UNKNOWN_HIT_MODE' // Not one of the HitMode values
  | 'INVALID_OPTIONS' // Malformed options object

/**
 * Error thrown when a matcher is built or called with arguments it cannot honour.
 *
 * All failures are validation failures: the call produced no output and
 * repeating it with the same arguments fails the same way.
 *
 * @public
 */
export class MatcherError extends Error {
  /** Error classification code */
  readonly code: MatcherErrorCode

  /** Dictionary index of the offending pattern, when there is one */
  readonly index?: number

  constructor(code: MatcherErrorCode, message: string, index?: number) {
    super(message)
    this.name = 'MatcherError'
    this.code = code
    this.index = index
  }
}
