import { type TokenValue, valueOf } from '../catalog'
import { LexerConfigurationError } from '../errors'
import rawGrammar from './vt100-grammar.json'

export type ParamShape = 'single' | 'pair'

export interface ParameterizedRule {
  readonly shape: ParamShape
  readonly token: TokenValue
}

export type ByteTable = ReadonlyMap<number, TokenValue>
export type BodyTable = ReadonlyMap<string, TokenValue>

/**
 * Lookup tables for every recognized sequence, keyed by byte for single-byte
 * finals and by body text for `ESC [` and `ESC <digit>` sequences.
 */
export interface Vt100Grammar {
  readonly escape: ByteTable
  readonly pound: ByteTable
  readonly leftParen: ByteTable
  readonly rightParen: ByteTable
  readonly escapeDigit: BodyTable
  readonly bracket: ReadonlyMap<number, BodyTable>
  readonly parameterized: ReadonlyMap<number, ParameterizedRule>
}

interface GrammarSource {
  readonly escape: Readonly<Record<string, string>>
  readonly pound: Readonly<Record<string, string>>
  readonly leftParen: Readonly<Record<string, string>>
  readonly rightParen: Readonly<Record<string, string>>
  readonly escapeDigit: Readonly<Record<string, string>>
  readonly bracket: Readonly<Record<string, Readonly<Record<string, string>>>>
  readonly parameterized: Readonly<
    Record<string, { readonly shape: string; readonly token: string }>
  >
}

const resolveToken = (name: string, where: string): TokenValue => {
  const value = valueOf(name)
  if (value === undefined) {
    throw new LexerConfigurationError(
      `Grammar entry ${where} names unknown token "${name}"`,
    )
  }
  return value
}

const toByteKey = (key: string, where: string): number => {
  if (key.length !== 1) {
    throw new LexerConfigurationError(
      `Grammar table ${where} expects single-byte keys, got "${key}"`,
    )
  }
  return key.charCodeAt(0)
}

const isParamShape = (value: string): value is ParamShape =>
  value === 'single' || value === 'pair'

const buildByteTable = (
  entries: Readonly<Record<string, string>>,
  where: string,
): ByteTable => {
  const table = new Map<number, TokenValue>()
  for (const [key, name] of Object.entries(entries)) {
    table.set(toByteKey(key, where), resolveToken(name, `${where}.${key}`))
  }
  return table
}

const buildBodyTable = (
  entries: Readonly<Record<string, string>>,
  where: string,
  terminator?: string,
): BodyTable => {
  const table = new Map<string, TokenValue>()
  for (const [body, name] of Object.entries(entries)) {
    if (terminator !== undefined && !body.endsWith(terminator)) {
      throw new LexerConfigurationError(
        `Grammar body "${body}" does not end with its terminator "${terminator}"`,
      )
    }
    table.set(body, resolveToken(name, `${where}.${body}`))
  }
  return table
}

export const buildGrammar = (source: GrammarSource): Vt100Grammar => {
  const bracket = new Map<number, BodyTable>()
  for (const [terminator, bodies] of Object.entries(source.bracket)) {
    bracket.set(
      toByteKey(terminator, 'bracket'),
      buildBodyTable(bodies, `bracket.${terminator}`, terminator),
    )
  }

  const parameterized = new Map<number, ParameterizedRule>()
  for (const [terminator, rule] of Object.entries(source.parameterized)) {
    if (!isParamShape(rule.shape)) {
      throw new LexerConfigurationError(
        `Grammar rule parameterized.${terminator} has unknown shape "${rule.shape}"`,
      )
    }
    parameterized.set(toByteKey(terminator, 'parameterized'), {
      shape: rule.shape,
      token: resolveToken(rule.token, `parameterized.${terminator}`),
    })
  }

  return {
    escape: buildByteTable(source.escape, 'escape'),
    pound: buildByteTable(source.pound, 'pound'),
    leftParen: buildByteTable(source.leftParen, 'leftParen'),
    rightParen: buildByteTable(source.rightParen, 'rightParen'),
    escapeDigit: buildBodyTable(source.escapeDigit, 'escapeDigit'),
    bracket,
    parameterized,
  }
}

export const VT100_GRAMMAR: Vt100Grammar = buildGrammar(rawGrammar)
