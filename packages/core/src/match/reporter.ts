/**
 * Reporter - hit reports and span masking on top of the scanner.
 * @packageDocumentation
 */

import { z } from 'zod'
import type {
  HitReport,
  Matcher,
  NoHits,
  PositionWordHits,
  ProcessOptions,
  ProcessResult,
  WordCountHits,
  WordListHits,
  WordPositionHits,
} from '../types'
import { HitMode, MatcherError } from '../types'
import { countCodepoints, decodeBytes, encodeText, isLeadByte } from './encoding'
import { scan } from './scanner'

const processOptionsSchema = z.object({
  hitMode: z.union([
    z.literal(HitMode.None),
    z.literal(HitMode.WordList),
    z.literal(HitMode.WordCounts),
    z.literal(HitMode.WordPositions),
    z.literal(HitMode.PositionToWord),
  ]),
  replace: z.boolean(),
  replacement: z.string().default('*'),
})

type ResolvedProcessOptions = z.infer<typeof processOptionsSchema>

/**
 * Collects hits into the shape of one report mode.
 */
interface HitSink {
  record(word: string, position: number): void
  report(): HitReport
}

/**
 * Decoded text and codepoint length of a matched pattern.
 */
interface PatternInfo {
  readonly text: string
  readonly codepoints: number
}

/**
 * Validate processing options.
 *
 * @throws MatcherError with code `UNKNOWN_HIT_MODE`, `HIT_MODE_REQUIRES_REPLACE`
 *   or `INVALID_OPTIONS`
 */
function resolveProcessOptions(options: ProcessOptions): ResolvedProcessOptions {
  const parsed = processOptionsSchema.safeParse(options)

  if (!parsed.success) {
    const hitModeIssue = parsed.error.issues.find((issue) => issue.path[0] === 'hitMode')
    if (hitModeIssue) {
      throw new MatcherError('UNKNOWN_HIT_MODE', `Unrecognized hit mode: ${String(options.hitMode)}`)
    }
    const issue = parsed.error.issues[0]
    throw new MatcherError('INVALID_OPTIONS', `Invalid process options: ${issue.path.join('.')}: ${issue.message}`)
  }

  if (parsed.data.hitMode === HitMode.None && !parsed.data.replace) {
    throw new MatcherError('HIT_MODE_REQUIRES_REPLACE', 'Hit mode None requires replace to be true')
  }

  return parsed.data
}

/**
 * Create the collector for a report mode, or null when no report is wanted.
 */
function createHitSink(mode: ResolvedProcessOptions['hitMode']): HitSink | null {
  switch (mode) {
    case HitMode.None:
      return null

    case HitMode.WordList: {
      const words: string[] = []
      return {
        record: (word) => {
          words.push(word)
        },
        report: (): WordListHits => ({ mode: HitMode.WordList, words }),
      }
    }

    case HitMode.WordCounts: {
      const counts = new Map<string, number>()
      return {
        record: (word) => {
          counts.set(word, (counts.get(word) ?? 0) + 1)
        },
        report: (): WordCountHits => ({ mode: HitMode.WordCounts, counts }),
      }
    }

    case HitMode.WordPositions: {
      const positions = new Map<string, number[]>()
      return {
        record: (word, position) => {
          const list = positions.get(word)
          if (list) {
            list.push(position)
          } else {
            positions.set(word, [position])
          }
        },
        report: (): WordPositionHits => ({ mode: HitMode.WordPositions, positions }),
      }
    }

    case HitMode.PositionToWord: {
      const words = new Map<number, string>()
      return {
        record: (word, position) => {
          words.set(position, word)
        },
        report: (): PositionWordHits => ({ mode: HitMode.PositionToWord, words }),
      }
    }
  }
}

/**
 * Byte and codepoint length of the pattern at an output node.
 */
type SpanLengths = (nodeId: number) => { bytes: number; codepoints: number }

/**
 * Rebuild the input with every recorded span masked.
 *
 * Spans are applied in ascending start order. Input between spans is
 * copied only when the next span starts after the copy cursor, and each
 * span emits the token once per codepoint of its pattern. Spans that
 * overlap with different starts are not merged, so overlapping patterns
 * can produce more tokens than the input had codepoints.
 */
function maskSpans(
  input: Uint8Array,
  spans: ReadonlyMap<number, number>,
  lengths: SpanLengths,
  token: Uint8Array,
): Uint8Array {
  const chunks: Uint8Array[] = []
  let cursor = 0

  const ordered = [...spans].sort((a, b) => a[0] - b[0])
  for (const [start, nodeId] of ordered) {
    if (start > cursor) {
      chunks.push(input.subarray(cursor, start))
    }
    const { bytes, codepoints } = lengths(nodeId)
    for (let i = 0; i < codepoints; i++) {
      chunks.push(token)
    }
    cursor = start + bytes
  }

  if (cursor < input.length) {
    chunks.push(input.subarray(cursor))
  }

  const output = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0))
  let offset = 0
  for (const chunk of chunks) {
    output.set(chunk, offset)
    offset += chunk.length
  }
  return output
}

/**
 * Scan text, report hits and optionally mask them.
 *
 * The text is scanned as UTF-8. Every (pattern, end position) occurrence
 * is reported once; positions in reports count codepoints from the start
 * of the input.
 *
 * When masking, each occurrence is recorded by its start byte offset; of
 * several patterns starting at the same offset, the one found last (the
 * longest) is applied.
 *
 * @param matcher - Matcher built from the dictionary
 * @param input - Text to scan
 * @param options - Report mode, masking switch and token
 * @returns The masked text (or `''` without masking) and the hit report
 * @throws MatcherError for an unknown hit mode, or for `HitMode.None` without masking
 *
 * @public
 */
export function processText(
  matcher: Matcher,
  input: string,
  options: ProcessOptions<typeof HitMode.None>,
): ProcessResult<NoHits>
export function processText(
  matcher: Matcher,
  input: string,
  options: ProcessOptions<typeof HitMode.WordList>,
): ProcessResult<WordListHits>
export function processText(
  matcher: Matcher,
  input: string,
  options: ProcessOptions<typeof HitMode.WordCounts>,
): ProcessResult<WordCountHits>
export function processText(
  matcher: Matcher,
  input: string,
  options: ProcessOptions<typeof HitMode.WordPositions>,
): ProcessResult<WordPositionHits>
export function processText(
  matcher: Matcher,
  input: string,
  options: ProcessOptions<typeof HitMode.PositionToWord>,
): ProcessResult<PositionWordHits>
export function processText(matcher: Matcher, input: string, options: ProcessOptions): ProcessResult
export function processText(matcher: Matcher, input: string, options: ProcessOptions): ProcessResult {
  const { hitMode, replace, replacement } = resolveProcessOptions(options)
  const { nodes } = matcher.automaton
  const bytes = encodeText(input)
  const sink = createHitSink(hitMode)

  const patterns = new Map<number, PatternInfo>()
  const patternInfo = (nodeId: number): PatternInfo => {
    let info = patterns.get(nodeId)
    if (info === undefined) {
      const pattern = matcher.dictionary[nodes[nodeId].patternIndex]
      info = { text: decodeBytes(pattern), codepoints: countCodepoints(pattern) }
      patterns.set(nodeId, info)
    }
    return info
  }

  // Start byte offset -> output node
  const spans = new Map<number, number>()

  // Codepoints in bytes[0, scanned)
  let scanned = 0
  let codepoints = 0

  scan(matcher.automaton, bytes, false, (nodeId, last) => {
    if (replace) {
      spans.set(last + 1 - nodes[nodeId].depth, nodeId)
    }
    if (sink === null) {
      return
    }

    for (; scanned <= last; scanned++) {
      if (isLeadByte(bytes[scanned])) {
        codepoints++
      }
    }
    const info = patternInfo(nodeId)
    sink.record(info.text, codepoints - info.codepoints)
  })

  // Without spans the input is returned as given, unpaired surrogates included
  const output = !replace
    ? ''
    : spans.size === 0
      ? input
      : decodeBytes(
        maskSpans(
          bytes,
          spans,
          (nodeId) => ({ bytes: nodes[nodeId].depth, codepoints: patternInfo(nodeId).codepoints }),
          encodeText(replacement),
        ),
      )
  const hits: HitReport = sink === null ? { mode: HitMode.None } : sink.report()

  matcher.logger.debug({ hitMode, replace, inputBytes: bytes.length, spans: spans.size }, 'text processed')

  return { output, hits }
}
