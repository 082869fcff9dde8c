import { ByteFlag } from '../types'
import {
  ASCII_RANGE,
  BYTE_LIMITS,
  CONTROL_BYTES,
} from './byte-constants'

export interface ByteRange {
  readonly start: number
  readonly end: number
  readonly flag: ByteFlag
}

export const BYTE_RANGES: ReadonlyArray<ByteRange> = [
  {
    start: CONTROL_BYTES.NUL,
    end: ASCII_RANGE.C0_MAX,
    flag: ByteFlag.Control,
  },
  {
    start: CONTROL_BYTES.ESC,
    end: CONTROL_BYTES.ESC,
    flag: ByteFlag.Escape,
  },
  { start: CONTROL_BYTES.SPACE, end: CONTROL_BYTES.SPACE, flag: ByteFlag.Space },
  {
    start: ASCII_RANGE.GRAPHIC_MIN,
    end: ASCII_RANGE.GRAPHIC_MAX,
    flag: ByteFlag.Printable,
  },
  {
    start: BYTE_LIMITS.DIGIT_START,
    end: BYTE_LIMITS.DIGIT_END,
    flag: ByteFlag.Digit,
  },
  {
    start: BYTE_LIMITS.UPPERCASE_START,
    end: BYTE_LIMITS.UPPERCASE_END,
    flag: ByteFlag.Letter,
  },
  {
    start: BYTE_LIMITS.LOWERCASE_START,
    end: BYTE_LIMITS.LOWERCASE_END,
    flag: ByteFlag.Letter,
  },
  {
    start: CONTROL_BYTES.DELETE,
    end: CONTROL_BYTES.DELETE,
    flag: ByteFlag.Delete,
  },
]
