/**
 * Scanning, reporting and masking.
 * @packageDocumentation
 */

export { scan, match, findOccurrences, type HitCallback } from './scanner'
export { processText } from './reporter'
export { encodeText, decodeBytes, countCodepoints } from './encoding'
