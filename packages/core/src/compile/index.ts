/**
 * Automaton construction.
 * @packageDocumentation
 */

export {
  buildAutomaton,
  buildMatcher,
  buildStringMatcher,
  patternAt,
  type AutomatonBuild,
} from './automaton-builder'
