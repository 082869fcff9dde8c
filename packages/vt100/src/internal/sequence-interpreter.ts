import type { TokenValue } from '../catalog'
import type { ParamShape, Vt100Grammar } from './grammar'

export interface InterpretedSequence {
  readonly value: TokenValue
  readonly params: ReadonlyArray<number>
}

const SINGLE_PARAM = /^(\d+)$/
const PAIR_PARAM = /^(\d+);(\d+)$/

const decodeParam = (digits: string, maxValue: number): number | null => {
  const value = Number.parseInt(digits, 10)
  return value <= maxValue ? value : null
}

export const decodeParams = (
  shape: ParamShape,
  text: string,
  maxValue: number,
): number[] | null => {
  const match = (shape === 'single' ? SINGLE_PARAM : PAIR_PARAM).exec(text)
  if (!match) {
    return null
  }

  const params: number[] = []
  for (const digits of match.slice(1)) {
    const value = decodeParam(digits, maxValue)
    if (value === null) {
      return null
    }
    params.push(value)
  }
  return params
}

const PARAM_SEPARATORS: Record<ParamShape, number> = { single: 0, pair: 1 }
const PARAM_COUNTS: Record<ParamShape, number> = { single: 1, pair: 2 }

/**
 * Longest `ESC [` body, terminator included, that any grammar row can still
 * accept when parameters are written without leading zeros.
 */
export const maxBracketBodyLength = (
  grammar: Vt100Grammar,
  maxParamValue: number,
): number => {
  const digits = String(maxParamValue).length
  let longest = 0
  for (const table of grammar.bracket.values()) {
    for (const body of table.keys()) {
      longest = Math.max(longest, body.length)
    }
  }
  for (const { shape } of grammar.parameterized.values()) {
    const length =
      PARAM_COUNTS[shape] * digits + PARAM_SEPARATORS[shape] + 1
    longest = Math.max(longest, length)
  }
  return longest
}

/**
 * Match the body of an `ESC [` sequence (everything after the bracket,
 * terminator included) against the grammar. Literal rows win over
 * parameterized ones, so `ESC [ H` is CursorHome rather than a failed
 * CursorPos. Returns `null` when nothing matches.
 */
export const interpretSequence = (
  grammar: Vt100Grammar,
  terminator: number,
  body: string,
  maxParamValue: number,
): InterpretedSequence | null => {
  const literal = grammar.bracket.get(terminator)?.get(body)
  if (literal !== undefined) {
    return { value: literal, params: [] }
  }

  const rule = grammar.parameterized.get(terminator)
  if (!rule) {
    return null
  }

  const params = decodeParams(rule.shape, body.slice(0, -1), maxParamValue)
  if (!params) {
    return null
  }
  return { value: rule.token, params }
}
