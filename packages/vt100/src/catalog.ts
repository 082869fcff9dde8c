import { LexerConfigurationError } from './errors'

/**
 * Named outcomes recognized by the lexer. Values are negative so they never
 * collide with a raw 7-bit character, which is reported as its own byte value.
 */
export enum TokenValue {
  Align = -1,
  AltKeypad = -2,
  Blink = -3,
  Bold = -4,
  ClearBOL = -5,
  ClearBOS = -6,
  ClearEOL = -7,
  ClearEOS = -8,
  ClearLine = -9,
  ClearScreen = -10,
  CursorDn = -11,
  CursorHome = -12,
  CursorLf = -13,
  CursorPos = -14,
  CursorRt = -15,
  CursorUp = -16,
  DevStat = -17,
  DhBot = -18,
  DhTop = -19,
  Dwsh = -20,
  GetCursor = -21,
  HvHome = -22,
  HvPos = -23,
  Ident = -24,
  Index = -25,
  Invisible = -26,
  Led1 = -27,
  Led2 = -28,
  Led3 = -29,
  Led4 = -30,
  LedsOff = -31,
  LowInt = -32,
  ModesOff = -33,
  NextLine = -34,
  NumKeypad = -35,
  Reset = -36,
  ResetCol = -37,
  ResetInter = -38,
  ResetRep = -39,
  ResetWrap = -40,
  RestoreCursor = -41,
  Reverse = -42,
  RevIndex = -43,
  SaveCursor = -44,
  SetAltG0 = -45,
  SetAltG1 = -46,
  SetAltSpecG0 = -47,
  SetAltSpecG1 = -48,
  SetAppl = -49,
  SetCol = -50,
  SetCursor = -51,
  SetInter = -52,
  SetJump = -53,
  SetLF = -54,
  SetNL = -55,
  SetNormScrn = -56,
  SetOrgAbs = -57,
  SetOrgRel = -58,
  SetRep = -59,
  SetRevScrn = -60,
  SetSmooth = -61,
  SetSpecG0 = -62,
  SetSpecG1 = -63,
  SetSS2 = -64,
  SetSS3 = -65,
  SetUKG0 = -66,
  SetUKG1 = -67,
  SetUSG0 = -68,
  SetUSG1 = -69,
  SetVT52 = -70,
  SetWin = -71,
  SetWrap = -72,
  Swsh = -73,
  TabClr = -74,
  TabClrAll = -75,
  TabSet = -76,
  TestLB = -77,
  TestLBRep = -78,
  TestPU = -79,
  TestPURep = -80,
  Underline = -81,
}

/**
 * A token discriminator: either a named {@link TokenValue} or a non-negative
 * raw character (`0x00`-`0x7f`) that arrived outside any escape sequence.
 */
export type CatalogValue = TokenValue | number

export const TOKEN_COUNT = 81

const UNKNOWN_NAME = '?'

interface CatalogTables {
  readonly names: ReadonlyMap<number, string>
  readonly values: ReadonlyMap<string, TokenValue>
}

const buildCatalogTables = (): CatalogTables => {
  const names = new Map<number, string>()
  const values = new Map<string, TokenValue>()
  for (const [name, value] of Object.entries(TokenValue)) {
    if (typeof value === 'number') {
      names.set(value, name)
      values.set(name, value)
    }
  }

  // A duplicated initializer collapses two members onto one value.
  if (names.size !== TOKEN_COUNT || values.size !== TOKEN_COUNT) {
    throw new LexerConfigurationError(
      `Token catalog declares ${values.size} names for ${names.size} values, expected ${TOKEN_COUNT}`,
    )
  }

  return { names, values }
}

const { names: NAME_TABLE, values: VALUE_TABLE } = buildCatalogTables()

export const isNamedValue = (value: CatalogValue): value is TokenValue =>
  NAME_TABLE.has(value)

export const isRawCharacter = (value: CatalogValue): boolean =>
  Number.isInteger(value) && value >= 0x00 && value <= 0x7f

/**
 * Canonical name of a catalog value. Anything outside the named set,
 * raw characters included, renders as `?`.
 */
export const nameOf = (value: CatalogValue): string =>
  NAME_TABLE.get(value) ?? UNKNOWN_NAME

export const valueOf = (name: string): TokenValue | undefined =>
  VALUE_TABLE.get(name)

export const tokenNames = (): ReadonlyArray<string> =>
  Array.from(NAME_TABLE.values())
