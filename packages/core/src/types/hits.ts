// =============================================================================
// HIT MODES
// =============================================================================

/**
 * Shape of the hit report requested from `processText`.
 *
 * Numeric so that values coming from configuration files or other
 * processes keep their meaning.
 *
 * @public
 */
export const HitMode = {
  /** No report; replacement only */
  None: 0,
  /** Matched pattern texts in scan order */
  WordList: 1,
  /** Occurrence count per pattern text */
  WordCounts: 2,
  /** Codepoint start positions per pattern text */
  WordPositions: 3,
  /** Pattern text per codepoint start position */
  PositionToWord: 4,
} as const

/**
 * @public
 */
export type HitMode = (typeof HitMode)[keyof typeof HitMode]

// =============================================================================
// HIT REPORTS
// =============================================================================

/**
 * @public
 */
export interface NoHits {
  readonly mode: typeof HitMode.None
}

/**
 * One entry per (pattern, end position), in the order they were found.
 * @public
 */
export interface WordListHits {
  readonly mode: typeof HitMode.WordList
  readonly words: readonly string[]
}

/**
 * @public
 */
export interface WordCountHits {
  readonly mode: typeof HitMode.WordCounts
  readonly counts: ReadonlyMap<string, number>
}

/**
 * Start positions are counted in codepoints, not bytes.
 * @public
 */
export interface WordPositionHits {
  readonly mode: typeof HitMode.WordPositions
  readonly positions: ReadonlyMap<string, readonly number[]>
}

/**
 * Start positions are counted in codepoints. When two patterns start at
 * the same position, the one found later wins.
 * @public
 */
export interface PositionWordHits {
  readonly mode: typeof HitMode.PositionToWord
  readonly words: ReadonlyMap<number, string>
}

/**
 * Hit report, tagged by the mode that produced it.
 * @public
 */
export type HitReport = NoHits | WordListHits | WordCountHits | WordPositionHits | PositionWordHits

// =============================================================================
// PROCESSING
// =============================================================================

/**
 * Options for `processText`.
 *
 * @public
 */
export interface ProcessOptions<M extends HitMode = HitMode> {
  /** Report shape */
  hitMode: M

  /** Mask matched spans in the output */
  replace: boolean

  /**
   * Token emitted once per codepoint of each masked pattern.
   * @defaultValue '*'
   */
  replacement?: string
}

/**
 * @public
 */
export interface ProcessResult<R extends HitReport = HitReport> {
  /** Masked text when replacing, otherwise the empty string */
  readonly output: string

  readonly hits: R
}
