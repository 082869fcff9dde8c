export const SEVEN_BIT_MASK = 0x7f

export const BYTE_TABLE_SIZE = 0x80

export const CONTROL_BYTES = {
  NUL: 0x00,
  ESC: 0x1b,
  SPACE: 0x20,
  DELETE: 0x7f,
} as const

export const ASCII_RANGE = {
  C0_MAX: 0x1f,
  GRAPHIC_MIN: 0x21,
  GRAPHIC_MAX: 0x7e,
} as const

export const BYTE_LIMITS = {
  DIGIT_START: 0x30,
  DIGIT_END: 0x39,
  UPPERCASE_START: 0x41,
  UPPERCASE_END: 0x5a,
  LOWERCASE_START: 0x61,
  LOWERCASE_END: 0x7a,
} as const

export const ASCII_CODES = {
  HASH: 0x23,
  LEFT_PAREN: 0x28,
  RIGHT_PAREN: 0x29,
  LEFT_SQUARE_BRACKET: 0x5b,
} as const
