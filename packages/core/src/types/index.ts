/**
 * Type definitions for the matcher.
 * @packageDocumentation
 */

// Automaton types
export type {
  TrieNode,
  Automaton,
  EmptyPatternPolicy,
  MatcherOptions,
  Matcher,
  MatchOptions,
  Occurrence,
} from './automaton'
export { ALPHABET_SIZE, ROOT } from './automaton'

// Hit report types
export type {
  NoHits,
  WordListHits,
  WordCountHits,
  WordPositionHits,
  PositionWordHits,
  HitReport,
  ProcessOptions,
  ProcessResult,
} from './hits'
export { HitMode } from './hits'

// Error types
export type { MatcherErrorCode } from './errors'
export { MatcherError } from './errors'
