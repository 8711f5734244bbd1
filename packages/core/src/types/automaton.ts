import type { Logger } from 'pino'

// =============================================================================
// AUTOMATON
// =============================================================================

/**
 * Number of distinct input symbols. The automaton consumes raw bytes.
 * @public
 */
export const ALPHABET_SIZE = 256

/**
 * Id of the root node in every automaton.
 * @public
 */
export const ROOT = 0

/**
 * A vertex of the trie, after construction.
 *
 * Nodes live in a single arena and refer to each other by id, so the
 * fail and suffix links (which converge on shared ancestors) never own
 * their targets.
 *
 * @public
 */
export interface TrieNode {
  /** Unique identifier (index in the nodes array) */
  readonly id: number

  /** Length in bytes of the path from the root to this node */
  readonly depth: number

  /** Does this node's path spell a complete dictionary pattern? */
  readonly output: boolean

  /** Dictionary index of that pattern, or -1 when not an output node */
  readonly patternIndex: number

  /** Trie edges keyed by byte value */
  readonly children: ReadonlyMap<number, number>

  /**
   * Node of the longest proper suffix of this path that is itself a trie path.
   * The root fails to itself; that link is never followed.
   */
  readonly fail: number

  /** Nearest proper suffix node that is an output node, or the root */
  readonly suffixLink: number
}

/**
 * Deterministic Aho-Corasick automaton over bytes.
 *
 * `transitions[id * ALPHABET_SIZE + byte]` is the node reached from `id` on
 * `byte`: the trie child when there is one, otherwise the result of falling
 * back through the fail chain, with the root as the base case. The table is
 * total, so scanning never chases fail links.
 *
 * @public
 */
export interface Automaton {
  /** All nodes; `nodes[ROOT]` is the root */
  readonly nodes: readonly TrieNode[]

  /** Dense transition table, `nodes.length * ALPHABET_SIZE` entries */
  readonly transitions: Int32Array
}

// =============================================================================
// MATCHER
// =============================================================================

/**
 * What to do with empty patterns in a dictionary.
 *
 * - `ignore`: skip them; they never match and construction succeeds
 * - `reject`: throw a `MatcherError` with code `EMPTY_PATTERN`
 *
 * @public
 */
export type EmptyPatternPolicy = 'ignore' | 'reject'

/**
 * Options for matcher construction.
 *
 * @public
 */
export interface MatcherOptions {
  /**
   * Handling of empty dictionary entries.
   * @defaultValue 'ignore'
   */
  emptyPatterns?: EmptyPatternPolicy

  /** Logger for construction and processing diagnostics */
  logger?: Logger
}

/**
 * A built automaton together with the dictionary it was built from.
 *
 * Matchers are immutable. Scans keep their bookkeeping in call-local
 * buffers, so one matcher can serve any number of calls, including
 * re-entrant ones.
 *
 * @public
 */
export interface Matcher {
  readonly automaton: Automaton

  /** Private copy of the dictionary, in the caller's order */
  readonly dictionary: readonly Uint8Array[]

  /** Dictionary indices skipped because they were empty */
  readonly skippedPatterns: readonly number[]

  /** Child logger for processing diagnostics, created once per matcher */
  readonly logger: Logger
}

/**
 * Options for byte matching.
 *
 * @public
 */
export interface MatchOptions {
  /**
   * Report each dictionary entry at most once per call (at its first
   * occurrence) instead of once per occurrence.
   * @defaultValue false
   */
  distinct?: boolean
}

/**
 * One occurrence of a dictionary pattern in the input.
 *
 * @public
 */
export interface Occurrence {
  /** Dictionary index of the matched pattern */
  readonly patternIndex: number

  /** Byte offset of the first matched byte */
  readonly start: number

  /** Byte offset just past the last matched byte */
  readonly end: number
}
