/**
 * Multi-pattern matching library
 *
 * Compiles a dictionary of byte patterns into an Aho-Corasick automaton
 * once, then finds every occurrence of every pattern in a single pass over
 * each input. Text helpers report hits in several shapes and mask matched
 * spans.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  TrieNode,
  Automaton,
  EmptyPatternPolicy,
  MatcherOptions,
  Matcher,
  MatchOptions,
  Occurrence,
  // Hit report types
  NoHits,
  WordListHits,
  WordCountHits,
  WordPositionHits,
  PositionWordHits,
  HitReport,
  ProcessOptions,
  ProcessResult,
  // Error types
  MatcherErrorCode,
} from './types'
export { ALPHABET_SIZE, ROOT, HitMode, MatcherError } from './types'

// =============================================================================
// Construction
// =============================================================================

export { buildMatcher, buildStringMatcher, buildAutomaton, patternAt, type AutomatonBuild } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { match, findOccurrences, scan, type HitCallback } from './match'
export { processText } from './match'
export { encodeText, decodeBytes, countCodepoints } from './match'

// =============================================================================
// Configuration & Logging
// =============================================================================

export { parseEnvironment, LOG_LEVELS, type Environment } from './environment'
export { getLogger, namespacedLogger, type LogNamespace } from './logs'
