/**
 * UTF-8 conversions between text and the bytes the automaton consumes.
 * @packageDocumentation
 */

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Encode text as UTF-8.
 *
 * @public
 */
export function encodeText(text: string): Uint8Array {
  return encoder.encode(text)
}

/**
 * Decode UTF-8 bytes to text. Malformed sequences become U+FFFD.
 *
 * @public
 */
export function decodeBytes(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/**
 * Is this byte the first byte of a UTF-8 sequence (not a continuation byte)?
 */
export function isLeadByte(byte: number): boolean {
  return (byte & 0xc0) !== 0x80
}

/**
 * Count the codepoints encoded in `bytes[start, end)`.
 *
 * Counts lead bytes, so a truncated sequence still counts as one
 * codepoint and stray continuation bytes count as none.
 *
 * @param bytes - UTF-8 encoded data
 * @param start - First byte offset (inclusive)
 * @param end - Last byte offset (exclusive)
 * @returns Number of codepoints in the range
 *
 * @public
 */
export function countCodepoints(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let count = 0
  for (let i = start; i < end; i++) {
    if (isLeadByte(bytes[i])) {
      count++
    }
  }
  return count
}
