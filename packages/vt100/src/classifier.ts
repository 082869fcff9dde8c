import { SEVEN_BIT_MASK } from './internal/byte-constants'
import { BYTE_RANGES } from './internal/char-class'
import { ByteFlag } from './types'

/**
 * Determine the classes of a byte after stripping the high bit. Every 7-bit
 * value lands in at least one range, so the result is never `None`.
 */
export const classifyByte = (value: number): ByteFlag => {
  const byte = value & SEVEN_BIT_MASK
  let flags = ByteFlag.None
  for (const spec of BYTE_RANGES) {
    if (byte >= spec.start && byte <= spec.end) {
      flags |= spec.flag
    }
  }
  return flags
}
