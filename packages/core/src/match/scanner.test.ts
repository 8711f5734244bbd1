import { describe, it, expect } from 'vitest'
import { match, findOccurrences, scan } from './scanner'
import { encodeText } from './encoding'
import { buildMatcher, buildStringMatcher } from '../compile'

/**
 * Small deterministic PRNG so generated cases are reproducible.
 */
function mulberry32(seed: number): () => number {
  let state = seed
  return () => {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

function randomWord(random: () => number, alphabet: string, minLength: number, maxLength: number): string {
  const length = minLength + Math.floor(random() * (maxLength - minLength + 1))
  let word = ''
  for (let i = 0; i < length; i++) {
    word += alphabet[Math.floor(random() * alphabet.length)]
  }
  return word
}

/**
 * Every (pattern index, end offset) pair found by direct substring comparison.
 * Duplicate patterns resolve to their last index.
 */
function bruteForce(dictionary: readonly string[], input: string): string[] {
  const lastIndex = new Map<string, number>()
  dictionary.forEach((word, index) => lastIndex.set(word, index))

  const pairs: string[] = []
  for (const [word, index] of lastIndex) {
    for (let start = 0; start + word.length <= input.length; start++) {
      if (input.startsWith(word, start)) {
        pairs.push(`${index}@${start + word.length}`)
      }
    }
  }
  return pairs.sort()
}

describe('match', () => {
  const matcher = buildStringMatcher(['he', 'she', 'his', 'hers'])

  it('reports every pattern ending at each position', () => {
    // his ends at 3, she and he at 5, hers at 7
    expect(match(matcher, encodeText('ahishers'))).toEqual([2, 1, 0, 3])
  })

  it('reports a node before its suffix chain', () => {
    expect(match(matcher, encodeText('she'))).toEqual([1, 0])
  })

  it('reports repeated occurrences', () => {
    expect(match(matcher, encodeText('hehe'))).toEqual([0, 0])
  })

  it('returns nothing when no pattern occurs', () => {
    expect(match(matcher, encodeText('xyz'))).toEqual([])
    expect(match(matcher, new Uint8Array(0))).toEqual([])
  })

  it('is repeatable on the same matcher', () => {
    const input = encodeText('ushers and his hens')
    const first = match(matcher, input)

    expect(first).toEqual([1, 0, 3, 2, 0])
    expect(match(matcher, input)).toEqual(first)
  })

  it('finds overlapping occurrences of the same pattern', () => {
    const aa = buildStringMatcher(['aa'])
    expect(match(aa, encodeText('aaaa'))).toEqual([0, 0, 0])
  })

  it('returns the last index for duplicate patterns', () => {
    const duplicates = buildStringMatcher(['ab', 'ab'])
    expect(match(duplicates, encodeText('ab'))).toEqual([1])
  })

  it('returns nothing for an empty dictionary', () => {
    const empty = buildStringMatcher([])
    expect(match(empty, encodeText('anything'))).toEqual([])
  })

  it('matches arbitrary byte values', () => {
    const binary = buildMatcher([Uint8Array.of(0x00, 0xff)])
    expect(match(binary, Uint8Array.of(0x01, 0x00, 0xff, 0x00, 0xff))).toEqual([0, 0])
  })

  describe('distinct', () => {
    it('reports each pattern once per call', () => {
      expect(match(matcher, encodeText('hehe'), { distinct: true })).toEqual([0])
    })

    it('stops suffix walks at nodes already reported', () => {
      const nested = buildStringMatcher(['she', 'he'])

      expect(match(nested, encodeText('shehe'))).toEqual([0, 1, 1])
      expect(match(nested, encodeText('shehe'), { distinct: true })).toEqual([0, 1])
    })

    it('does not carry state into the next call', () => {
      const input = encodeText('hehe')
      match(matcher, input, { distinct: true })
      expect(match(matcher, input, { distinct: true })).toEqual([0])
    })
  })

  describe('against brute-force search', () => {
    const random = mulberry32(20240611)

    for (let round = 0; round < 40; round++) {
      const dictionary = Array.from({ length: 1 + Math.floor(random() * 6) }, () => randomWord(random, 'abc', 1, 4))
      const input = randomWord(random, 'abc', 0, 30)

      it(`finds the same occurrences for ${JSON.stringify(dictionary)} in "${input}"`, () => {
        const found = findOccurrences(buildStringMatcher(dictionary), encodeText(input))
        const pairs = found.map((o) => `${o.patternIndex}@${o.end}`).sort()

        expect(pairs).toEqual(bruteForce(dictionary, input))
      })
    }
  })

  it('relabels but does not change spans when the dictionary is permuted', () => {
    const input = encodeText('abcabcab')
    const forward = findOccurrences(buildStringMatcher(['ab', 'bca', 'c']), input)
    const reversed = findOccurrences(buildStringMatcher(['c', 'bca', 'ab']), input)

    const spans = (list: typeof forward) => list.map((o) => `${o.start}-${o.end}`).sort()
    expect(spans(reversed)).toEqual(spans(forward))
  })
})

describe('findOccurrences', () => {
  it('reports byte spans in discovery order', () => {
    const matcher = buildStringMatcher(['he', 'she', 'his', 'hers'])

    expect(findOccurrences(matcher, encodeText('ahishers'))).toEqual([
      { patternIndex: 2, start: 1, end: 4 },
      { patternIndex: 1, start: 3, end: 6 },
      { patternIndex: 0, start: 4, end: 6 },
      { patternIndex: 3, start: 4, end: 8 },
    ])
  })

  it('measures spans in bytes', () => {
    const matcher = buildStringMatcher(['界'])
    expect(findOccurrences(matcher, encodeText('世界'))).toEqual([{ patternIndex: 0, start: 3, end: 6 }])
  })
})

describe('scan', () => {
  it('passes the offset of the last matched byte', () => {
    const matcher = buildStringMatcher(['ab', 'b'])
    const calls: [number, number][] = []

    scan(matcher.automaton, encodeText('xab'), false, (nodeId, last) => {
      calls.push([nodeId, last])
    })

    // nodes: 0 root, 1 a, 2 ab, 3 b
    expect(calls).toEqual([
      [2, 2],
      [3, 2],
    ])
  })

  it('allows matching on the same matcher from inside a callback', () => {
    const matcher = buildStringMatcher(['he', 'she', 'his', 'hers'])
    const outer = encodeText('ahishers')
    const inner = encodeText('hehe')
    const outerHits: number[] = []
    const innerResults: number[][] = []

    scan(matcher.automaton, outer, false, (nodeId) => {
      outerHits.push(matcher.automaton.nodes[nodeId].patternIndex)
      innerResults.push(match(matcher, inner))
    })

    expect(outerHits).toEqual(match(matcher, outer))
    expect(outerHits).toEqual([2, 1, 0, 3])
    expect(innerResults).toEqual([
      [0, 0],
      [0, 0],
      [0, 0],
      [0, 0],
    ])
  })
})
