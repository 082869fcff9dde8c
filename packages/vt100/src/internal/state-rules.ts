import type { TokenValue } from '../catalog'
import {
  ByteFlag,
  type DiscardReason,
  LexerState,
  type TokenSink,
} from '../types'
import { ASCII_CODES, CONTROL_BYTES } from './byte-constants'
import type { ByteTable, Vt100Grammar } from './grammar'
import { interpretSequence } from './sequence-interpreter'

export { BYTE_TABLE_SIZE } from './byte-constants'

export type ByteHandler = (byte: number, sink: TokenSink) => void
export type ByteRulePredicate = (byte: number, flags: ByteFlag) => boolean

export interface ByteRule {
  readonly predicate: ByteRulePredicate
  readonly handler: ByteHandler
}

export interface StateRuleSpec {
  readonly fallback: ByteHandler
  readonly rules: ReadonlyArray<ByteRule>
}

export type StateRuleSpecMap = Record<LexerState, StateRuleSpec>

export interface StateRuleRuntime {
  readonly grammar: Vt100Grammar
  readonly maxParamValue: number
  readonly noop: ByteHandler
  setState(state: LexerState): void
  beginSequence(byte: number): void
  /** Whether bytes of the current sequence were dropped for length. */
  sequenceTruncated(): boolean
  /** Sequence text from `offset` to the current byte inclusive. */
  sequenceBody(offset: number): string
  emitCharacter(byte: number, sink: TokenSink): void
  emitToken(
    value: TokenValue,
    sink: TokenSink,
    params?: ReadonlyArray<number>,
  ): void
  discard(reason: DiscardReason, sink: TokenSink): void
}

export const matchBytes = (...codes: number[]): ByteRulePredicate => {
  const set = new Set(codes)
  return (byte) => set.has(byte)
}

export const matchFlag =
  (flag: ByteFlag): ByteRulePredicate =>
  (_byte, flags) =>
    (flags & flag) !== 0

export const matchTable =
  (table: ByteTable): ByteRulePredicate =>
  (byte) =>
    table.has(byte)

export const createStateRuleSpecs = (
  runtime: StateRuleRuntime,
): StateRuleSpecMap => ({
  [LexerState.Ground]: createGroundSpec(runtime),
  [LexerState.AfterEscape]: createEscapeSpec(runtime),
  [LexerState.AfterBracket]: createBracketSpec(runtime),
  [LexerState.AfterLeftParen]: createFinalTableSpec(
    runtime,
    runtime.grammar.leftParen,
  ),
  [LexerState.AfterRightParen]: createFinalTableSpec(
    runtime,
    runtime.grammar.rightParen,
  ),
  [LexerState.AfterPound]: createFinalTableSpec(runtime, runtime.grammar.pound),
  [LexerState.AfterEscapeDigit]: createEscapeDigitSpec(runtime),
})

const createGroundSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const enterEscape: ByteHandler = (byte) => {
    runtime.beginSequence(byte)
    runtime.setState(LexerState.AfterEscape)
  }

  return {
    fallback: (byte, sink) => runtime.emitCharacter(byte, sink),
    rules: [
      { predicate: matchBytes(CONTROL_BYTES.ESC), handler: enterEscape },
    ],
  }
}

const createEscapeSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const { escape } = runtime.grammar

  const transitionTo =
    (state: LexerState): ByteHandler =>
    () => {
      runtime.setState(state)
    }

  const dispatchEscape: ByteHandler = (byte, sink) => {
    const value = escape.get(byte)
    if (value === undefined) {
      runtime.discard('unknown_escape', sink)
      return
    }
    runtime.emitToken(value, sink)
  }

  // Table finals come before the digit rule: ESC 7 and ESC 8 are cursor
  // save/restore, not device status.
  const rules: ByteRule[] = [
    {
      predicate: matchBytes(ASCII_CODES.LEFT_SQUARE_BRACKET),
      handler: transitionTo(LexerState.AfterBracket),
    },
    {
      predicate: matchBytes(ASCII_CODES.LEFT_PAREN),
      handler: transitionTo(LexerState.AfterLeftParen),
    },
    {
      predicate: matchBytes(ASCII_CODES.RIGHT_PAREN),
      handler: transitionTo(LexerState.AfterRightParen),
    },
    {
      predicate: matchBytes(ASCII_CODES.HASH),
      handler: transitionTo(LexerState.AfterPound),
    },
    { predicate: matchTable(escape), handler: dispatchEscape },
    {
      predicate: matchFlag(ByteFlag.Digit),
      handler: transitionTo(LexerState.AfterEscapeDigit),
    },
  ]

  return {
    fallback: (_byte, sink) => runtime.discard('unknown_escape', sink),
    rules,
  }
}

const createBracketSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const interpretTerminator: ByteHandler = (byte, sink) => {
    if (runtime.sequenceTruncated()) {
      runtime.discard('unmatched_body', sink)
      return
    }
    // Skip ESC and '['.
    const body = runtime.sequenceBody(2)
    const match = interpretSequence(
      runtime.grammar,
      byte,
      body,
      runtime.maxParamValue,
    )
    if (!match) {
      runtime.discard('unmatched_body', sink)
      return
    }
    runtime.emitToken(match.value, sink, match.params)
  }

  return {
    fallback: (_byte, sink) => runtime.discard('invalid_byte', sink),
    rules: [
      { predicate: matchFlag(ByteFlag.Letter), handler: interpretTerminator },
      // Parameters, separators and private markers accumulate in the sequence.
      { predicate: matchFlag(ByteFlag.Printable), handler: runtime.noop },
    ],
  }
}

const createFinalTableSpec = (
  runtime: StateRuleRuntime,
  table: ByteTable,
): StateRuleSpec => ({
  fallback: (byte, sink) => {
    const value = table.get(byte)
    if (value === undefined) {
      runtime.discard('unmapped_final', sink)
      return
    }
    runtime.emitToken(value, sink)
  },
  rules: [],
})

const createEscapeDigitSpec = (runtime: StateRuleRuntime): StateRuleSpec => ({
  fallback: (_byte, sink) => {
    const value = runtime.grammar.escapeDigit.get(runtime.sequenceBody(1))
    if (value === undefined) {
      runtime.discard('unmapped_final', sink)
      return
    }
    runtime.emitToken(value, sink)
  },
  rules: [],
})
