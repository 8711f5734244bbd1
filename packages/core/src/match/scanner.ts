/**
 * Scanner - drives the automaton over input bytes and reports matches.
 * @packageDocumentation
 */

import type { Automaton, Matcher, MatchOptions, Occurrence } from '../types'
import { ALPHABET_SIZE, ROOT } from '../types'

/**
 * Receives each match as the scan finds it.
 *
 * @param nodeId - Output node that matched
 * @param last - Byte offset of the last matched byte
 *
 * @public
 */
export type HitCallback = (nodeId: number, last: number) => void

/**
 * Scan `input` once, reporting every pattern that ends at each position.
 *
 * Matches are reported left to right by end position. Within a position
 * the current node's own pattern comes first, followed by the outputs on
 * its suffix chain, longest first.
 *
 * Reported nodes are stamped with the current generation in a buffer owned
 * by this call, and a suffix walk stops at the first node already stamped.
 * The generation is the input position, or constant for the whole call when
 * `distinct` is set, in which case each output node is reported only at its
 * first occurrence. The automaton itself is only read.
 *
 * @param automaton - Built automaton
 * @param input - Bytes to scan
 * @param distinct - Report each output node at most once per call
 * @param onHit - Match callback
 *
 * @public
 */
export function scan(automaton: Automaton, input: Uint8Array, distinct: boolean, onHit: HitCallback): void {
  const { nodes, transitions } = automaton
  const stamps = new Int32Array(nodes.length)
  let state = ROOT

  for (let i = 0; i < input.length; i++) {
    state = transitions[state * ALPHABET_SIZE + input[i]]
    const generation = distinct ? 1 : i + 1
    const node = nodes[state]

    if (node.output && stamps[state] !== generation) {
      stamps[state] = generation
      onHit(state, i)
    }

    for (let link = node.suffixLink; link !== ROOT; link = nodes[link].suffixLink) {
      if (stamps[link] === generation) {
        // Rest of the chain was reported when this node was stamped
        break
      }
      stamps[link] = generation
      onHit(link, i)
    }
  }
}

/**
 * Find all dictionary patterns in `input`.
 *
 * @param matcher - Matcher built from the dictionary
 * @param input - Bytes to scan
 * @param options - Optional configuration
 * @returns Dictionary indices in discovery order, one per occurrence
 *   (or one per distinct pattern with `distinct`)
 *
 * @public
 */
export function match(matcher: Matcher, input: Uint8Array, options: MatchOptions = {}): number[] {
  const { nodes } = matcher.automaton
  const hits: number[] = []

  scan(matcher.automaton, input, options.distinct ?? false, (nodeId) => {
    hits.push(nodes[nodeId].patternIndex)
  })

  return hits
}

/**
 * Find all dictionary patterns in `input`, with their byte spans.
 *
 * @param matcher - Matcher built from the dictionary
 * @param input - Bytes to scan
 * @returns Occurrences in discovery order
 *
 * @public
 */
export function findOccurrences(matcher: Matcher, input: Uint8Array): Occurrence[] {
  const { nodes } = matcher.automaton
  const occurrences: Occurrence[] = []

  scan(matcher.automaton, input, false, (nodeId, last) => {
    const node = nodes[nodeId]
    occurrences.push({ patternIndex: node.patternIndex, start: last + 1 - node.depth, end: last + 1 })
  })

  return occurrences
}
