import type { TokenValue } from './catalog'
import { classifyByte } from './classifier'
import { SEVEN_BIT_MASK } from './internal/byte-constants'
import { createInitialContext } from './internal/context'
import { VT100_GRAMMAR, type Vt100Grammar } from './internal/grammar'
import { resolveMaxParamValue } from './internal/resolve-options'
import { maxBracketBodyLength } from './internal/sequence-interpreter'
import {
  BYTE_TABLE_SIZE,
  type ByteHandler,
  createStateRuleSpecs,
  type StateRuleRuntime,
  type StateRuleSpec,
} from './internal/state-rules'
import {
  type DiscardReason,
  LexerState,
  type StateMachine,
  type StateMachineOptions,
  type Token,
  type TokenSink,
} from './types'

const EMPTY_PARAMS: ReadonlyArray<number> = Object.freeze([])

// ESC and the byte that selects the sequence family.
const SEQUENCE_PREFIX_LENGTH = 2

const toText = (codes: ReadonlyArray<number>): string => {
  let text = ''
  for (const code of codes) {
    text += String.fromCharCode(code)
  }
  return text
}

class StateMachineImpl implements StateMachine {
  private context = createInitialContext()
  private readonly encoder = new TextEncoder()
  private readonly grammar: Vt100Grammar
  private readonly maxParamValue: number
  private readonly maxSequenceLength: number
  private readonly dispatchTable: Record<
    LexerState,
    ReadonlyArray<ByteHandler>
  >
  private readonly noopHandler: ByteHandler = () => {}

  constructor(grammar: Vt100Grammar, maxParamValue: number) {
    this.grammar = grammar
    this.maxParamValue = maxParamValue
    this.maxSequenceLength =
      SEQUENCE_PREFIX_LENGTH + maxBracketBodyLength(grammar, maxParamValue)
    this.dispatchTable = this.buildDispatchTable()
  }

  get state(): LexerState {
    return this.context.state
  }

  write(input: number | Uint8Array | string, sink: TokenSink): void {
    if (typeof input === 'number') {
      this.processByte(input, sink)
      return
    }

    const buffer =
      typeof input === 'string' ? this.encoder.encode(input) : input

    for (const byte of buffer) {
      this.processByte(byte, sink)
    }
  }

  reset(): void {
    this.context = createInitialContext()
  }

  private processByte(value: number, sink: TokenSink): void {
    const byte = value & SEVEN_BIT_MASK
    if (this.context.state !== LexerState.Ground) {
      this.record(byte)
    }

    const handler =
      this.dispatchTable[this.context.state][byte] ?? this.noopHandler
    handler(byte, sink)
  }

  /**
   * Keep the byte unless the sequence is already longer than any row can
   * match. The terminator still dispatches; the truncated sequence is then
   * discarded.
   */
  private record(byte: number): void {
    const { context } = this
    if (context.sequence.length < this.maxSequenceLength) {
      context.sequence.push(byte)
      return
    }
    context.truncated = true
  }

  private buildRowFromSpec(spec: StateRuleSpec): ByteHandler[] {
    const row = new Array<ByteHandler>(BYTE_TABLE_SIZE)
    for (let code = 0; code < BYTE_TABLE_SIZE; code += 1) {
      const flags = classifyByte(code)
      let handler = spec.fallback
      for (const rule of spec.rules) {
        if (rule.predicate(code, flags)) {
          handler = rule.handler
          break
        }
      }
      row[code] = handler
    }
    return row
  }

  private buildDispatchTable(): Record<LexerState, ReadonlyArray<ByteHandler>> {
    const specs = createStateRuleSpecs(this.createStateRuntime())
    return {
      [LexerState.Ground]: this.buildRowFromSpec(specs[LexerState.Ground]),
      [LexerState.AfterEscape]: this.buildRowFromSpec(
        specs[LexerState.AfterEscape],
      ),
      [LexerState.AfterBracket]: this.buildRowFromSpec(
        specs[LexerState.AfterBracket],
      ),
      [LexerState.AfterLeftParen]: this.buildRowFromSpec(
        specs[LexerState.AfterLeftParen],
      ),
      [LexerState.AfterRightParen]: this.buildRowFromSpec(
        specs[LexerState.AfterRightParen],
      ),
      [LexerState.AfterPound]: this.buildRowFromSpec(
        specs[LexerState.AfterPound],
      ),
      [LexerState.AfterEscapeDigit]: this.buildRowFromSpec(
        specs[LexerState.AfterEscapeDigit],
      ),
    }
  }

  private createStateRuntime(): StateRuleRuntime {
    return {
      grammar: this.grammar,
      maxParamValue: this.maxParamValue,
      noop: this.noopHandler,
      setState: (state) => {
        this.context.state = state
      },
      beginSequence: (byte) => {
        this.context.sequence = [byte]
        this.context.truncated = false
      },
      sequenceTruncated: () => this.context.truncated,
      sequenceBody: (offset) => toText(this.context.sequence.slice(offset)),
      emitCharacter: (byte, sink) => {
        this.emit(byte, [byte], EMPTY_PARAMS, sink)
      },
      emitToken: (value, sink, params = EMPTY_PARAMS) => {
        this.emitSequence(value, params, sink)
      },
      discard: (reason, sink) => {
        this.discard(reason, sink)
      },
    }
  }

  private emitSequence(
    value: TokenValue,
    params: ReadonlyArray<number>,
    sink: TokenSink,
  ): void {
    const raw = this.context.sequence
    this.returnToGround()
    this.emit(value, raw, params, sink)
  }

  private emit(
    value: number,
    raw: ReadonlyArray<number>,
    params: ReadonlyArray<number>,
    sink: TokenSink,
  ): void {
    // Typed arrays cannot be frozen; the token and its params can.
    const token: Token = Object.freeze({
      value,
      params: params.length === 0 ? EMPTY_PARAMS : Object.freeze([...params]),
      raw: Uint8Array.from(raw),
    })
    sink.onToken(token)
  }

  private discard(reason: DiscardReason, sink: TokenSink): void {
    const state = this.context.state
    const raw = Uint8Array.from(this.context.sequence)
    this.returnToGround()
    sink.onDiscard?.({ reason, state, raw })
  }

  private returnToGround(): void {
    this.context.state = LexerState.Ground
    this.context.sequence = []
    this.context.truncated = false
  }
}

/**
 * Create a synchronous VT100 recognizer. Bytes are masked to 7 bits and each
 * byte produces at most one token on the sink. Unrecognized sequences are
 * dropped; `onDiscard` reports them when the sink implements it.
 */
export const createStateMachine = (
  options: StateMachineOptions = {},
): StateMachine =>
  new StateMachineImpl(VT100_GRAMMAR, resolveMaxParamValue(options))
