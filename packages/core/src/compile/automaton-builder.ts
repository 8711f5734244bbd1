/**
 * Automaton builder - compiles a dictionary into an Aho-Corasick automaton.
 * @packageDocumentation
 */

import type { Logger } from 'pino'
import { z } from 'zod'
import type { Automaton, EmptyPatternPolicy, Matcher, MatcherOptions, TrieNode } from '../types'
import { ALPHABET_SIZE, MatcherError, ROOT } from '../types'
import { encodeText } from '../match/encoding'
import { getLogger, namespacedLogger } from '../logs'

const matcherOptionsSchema = z.object({
  emptyPatterns: z.enum(['ignore', 'reject']).default('ignore'),
})

/**
 * Result of compiling a dictionary.
 *
 * @public
 */
export interface AutomatonBuild {
  readonly automaton: Automaton

  /** Dictionary indices that were empty and therefore skipped */
  readonly skippedPatterns: readonly number[]
}

/**
 * Mutable node used while the trie is under construction.
 */
interface BuilderNode {
  id: number
  depth: number
  output: boolean
  patternIndex: number
  children: Map<number, number>
  fail: number
  suffixLink: number
}

/**
 * Mutable state for constructing the trie.
 */
interface TrieBuilder {
  nodes: BuilderNode[]
}

/**
 * Build an Aho-Corasick automaton from a dictionary of byte patterns.
 *
 * Construction:
 * 1. Insert every pattern into a trie. Duplicate patterns share a terminal
 *    node, which keeps the index of the last duplicate.
 * 2. Link every node to the longest proper suffix of its path that is a
 *    trie path (fail link), and to the longest one that is a complete
 *    pattern (suffix link).
 * 3. Fold the fail links into a total byte transition table.
 *
 * @param dictionary - Patterns, identified by position
 * @param emptyPatterns - Handling of empty patterns
 * @returns The automaton and the indices of skipped empty patterns
 * @throws MatcherError with code `EMPTY_PATTERN` when an empty pattern is rejected
 *
 * @public
 */
export function buildAutomaton(
  dictionary: readonly Uint8Array[],
  emptyPatterns: EmptyPatternPolicy = 'ignore',
): AutomatonBuild {
  const builder: TrieBuilder = { nodes: [] }

  createNode(builder, 0)

  const skippedPatterns: number[] = []
  dictionary.forEach((pattern, index) => {
    if (pattern.length === 0) {
      if (emptyPatterns === 'reject') {
        throw new MatcherError('EMPTY_PATTERN', `Dictionary entry ${index} is empty`, index)
      }
      skippedPatterns.push(index)
      return
    }
    insertPattern(builder, pattern, index)
  })

  const order = linkSuffixes(builder)
  const transitions = buildTransitionTable(builder, order)

  const nodes: TrieNode[] = builder.nodes.map((node) => ({
    id: node.id,
    depth: node.depth,
    output: node.output,
    patternIndex: node.patternIndex,
    children: node.children,
    fail: node.fail,
    suffixLink: node.suffixLink,
  }))

  return { automaton: { nodes, transitions }, skippedPatterns }
}

/**
 * Allocate a node at the given depth.
 */
function createNode(builder: TrieBuilder, depth: number): BuilderNode {
  const node: BuilderNode = {
    id: builder.nodes.length,
    depth,
    output: false,
    patternIndex: -1,
    children: new Map(),
    fail: ROOT,
    suffixLink: ROOT,
  }
  builder.nodes.push(node)
  return node
}

/**
 * Add one pattern to the trie and mark its terminal node.
 */
function insertPattern(builder: TrieBuilder, pattern: Uint8Array, index: number): void {
  let node = builder.nodes[ROOT]

  for (let i = 0; i < pattern.length; i++) {
    const childId = node.children.get(pattern[i])
    if (childId === undefined) {
      const child = createNode(builder, i + 1)
      node.children.set(pattern[i], child.id)
      node = child
    } else {
      node = builder.nodes[childId]
    }
  }

  // Last write wins for duplicates
  node.output = true
  node.patternIndex = index
}

/**
 * Compute fail and suffix links breadth-first.
 *
 * A child's fail target extends the parent's fail chain by the child's byte:
 * the first node on that chain with an edge for the byte gives the longest
 * proper suffix present in the trie, or the root when none has one. The
 * suffix link is the fail target when that is an output node, otherwise the
 * fail target's own suffix link. Fail targets are shallower, so both are
 * final by the time a node is reached. Nodes directly under the root keep
 * the root for both.
 *
 * @returns Node ids in breadth-first order (root first)
 */
function linkSuffixes(builder: TrieBuilder): number[] {
  const { nodes } = builder
  const order: number[] = [ROOT]

  for (let head = 0; head < order.length; head++) {
    const id = order[head]
    const node = nodes[id]

    for (const [byte, childId] of node.children) {
      order.push(childId)
      if (id === ROOT) {
        continue
      }

      let fallback = node.fail
      let target = nodes[fallback].children.get(byte)
      while (target === undefined && fallback !== ROOT) {
        fallback = nodes[fallback].fail
        target = nodes[fallback].children.get(byte)
      }

      const child = nodes[childId]
      child.fail = target ?? ROOT
      child.suffixLink = nodes[child.fail].output ? child.fail : nodes[child.fail].suffixLink
    }
  }

  return order
}

/**
 * Build the total transition table.
 *
 * A missing edge from a node behaves like the same byte read at its fail
 * node. Fail targets are strictly shallower, so visiting nodes in
 * breadth-first order guarantees the fail node's row is already filled.
 * Missing edges from the root lead back to the root.
 */
function buildTransitionTable(builder: TrieBuilder, order: readonly number[]): Int32Array {
  const table = new Int32Array(builder.nodes.length * ALPHABET_SIZE).fill(ROOT)

  for (const id of order) {
    const node = builder.nodes[id]
    const row = id * ALPHABET_SIZE
    const fallbackRow = node.fail * ALPHABET_SIZE

    for (let byte = 0; byte < ALPHABET_SIZE; byte++) {
      const child = node.children.get(byte)
      if (child !== undefined) {
        table[row + byte] = child
      } else if (id !== ROOT) {
        table[row + byte] = table[fallbackRow + byte]
      }
    }
  }

  return table
}

/**
 * Resolve construction options against their defaults.
 *
 * @throws MatcherError with code `INVALID_OPTIONS` for malformed options
 */
function resolveOptions(options: MatcherOptions): { emptyPatterns: EmptyPatternPolicy; logger: Logger } {
  const parsed = matcherOptionsSchema.safeParse({ emptyPatterns: options.emptyPatterns })
  if (!parsed.success) {
    throw new MatcherError('INVALID_OPTIONS', `Invalid matcher options: ${parsed.error.issues[0].message}`)
  }
  return { emptyPatterns: parsed.data.emptyPatterns, logger: options.logger ?? getLogger() }
}

/**
 * Build a matcher from a dictionary of byte patterns.
 *
 * The patterns are copied, so the caller may reuse its buffers.
 *
 * @param dictionary - Patterns, identified by position
 * @param options - Optional configuration
 * @returns An immutable matcher
 * @throws MatcherError when options are invalid or an empty pattern is rejected
 *
 * @public
 */
export function buildMatcher(dictionary: readonly Uint8Array[], options: MatcherOptions = {}): Matcher {
  const { emptyPatterns, logger } = resolveOptions(options)
  const log = namespacedLogger('builder', logger)

  const patterns = dictionary.map((pattern) => Uint8Array.from(pattern))
  const { automaton, skippedPatterns } = buildAutomaton(patterns, emptyPatterns)

  if (skippedPatterns.length > 0) {
    log.warn({ skippedPatterns }, 'empty patterns skipped; they never match')
  }
  log.debug({ patterns: patterns.length, nodes: automaton.nodes.length }, 'automaton built')

  return {
    automaton,
    dictionary: patterns,
    skippedPatterns,
    logger: namespacedLogger('reporter', logger),
  }
}

/**
 * Build a matcher from text patterns, encoded as UTF-8.
 *
 * @public
 */
export function buildStringMatcher(dictionary: readonly string[], options: MatcherOptions = {}): Matcher {
  return buildMatcher(dictionary.map(encodeText), options)
}

/**
 * Dictionary entry at `index`, as stored by the matcher.
 *
 * @returns The pattern bytes, or undefined when out of range
 *
 * @public
 */
export function patternAt(matcher: Matcher, index: number): Uint8Array | undefined {
  return matcher.dictionary[index]
}
