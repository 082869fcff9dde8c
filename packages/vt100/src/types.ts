import type { CatalogValue } from './catalog'

/**
 * Positions of the VT100 recognizer. Every sequence starts and ends in
 * `Ground`.
 */
export enum LexerState {
  Ground = 'ground',
  AfterEscape = 'after_escape',
  AfterBracket = 'after_bracket',
  AfterLeftParen = 'after_left_paren',
  AfterRightParen = 'after_right_paren',
  AfterPound = 'after_pound',
  AfterEscapeDigit = 'after_escape_digit',
}

/**
 * Bit flags that describe the classes a 7-bit byte belongs to. A byte may
 * carry several flags (a digit is also printable).
 */
export enum ByteFlag {
  None = 0,
  Control = 1 << 0,
  Escape = 1 << 1,
  Space = 1 << 2,
  Printable = 1 << 3,
  Digit = 1 << 4,
  Letter = 1 << 5,
  Delete = 1 << 6,
}

/**
 * One recognized unit of input. Frozen when emitted.
 */
export interface Token {
  readonly value: CatalogValue
  readonly params: ReadonlyArray<number>
  /** Bytes (7-bit masked) that produced the token, ESC included. */
  readonly raw: Uint8Array
}

export type DiscardReason =
  /** ESC followed by a byte that starts no known sequence. */
  | 'unknown_escape'
  /** Control, space or DEL inside an `ESC [` body. */
  | 'invalid_byte'
  /** Terminator reached but the body matches no grammar row. */
  | 'unmatched_body'
  /** Single-byte table (`ESC #`, `ESC (`, `ESC )`, `ESC <digit>`) has no entry. */
  | 'unmapped_final'

export interface SequenceDiscard {
  readonly reason: DiscardReason
  readonly state: LexerState
  readonly raw: Uint8Array
}

/**
 * Receives the output of the synchronous state machine.
 */
export interface TokenSink {
  onToken(token: Token): void
  onDiscard?(discard: SequenceDiscard): void
}

export interface StateMachine {
  readonly state: LexerState
  write(input: number | Uint8Array | string, sink: TokenSink): void
  reset(): void
}

export interface StateMachineOptions {
  /** Largest accepted numeric parameter. Larger values void the sequence. */
  readonly maxParamValue?: number
}

export type LexerDiagnosticEvent =
  | ({
      readonly type: 'sequence_discarded'
      readonly timestamp: number
    } & SequenceDiscard)
  | {
      readonly type: 'worker_stopped'
      readonly timestamp: number
      /**
       * Inbound bytes never processed: queued ones plus those held by
       * feeders still waiting for room.
       */
      readonly pendingInput: number
    }

export interface LexerOptions extends StateMachineOptions {
  readonly inboundCapacity?: number
  readonly outboundCapacity?: number
  readonly onDiagnostic?: (event: LexerDiagnosticEvent) => void
}

export interface ResolvedLexerOptions {
  readonly inboundCapacity: number
  readonly outboundCapacity: number
  readonly maxParamValue: number
  readonly onDiagnostic?: (event: LexerDiagnosticEvent) => void
}

export interface WaitOptions {
  readonly signal?: AbortSignal
}

/**
 * Outbound side of a lexer. Exposed so callers can race `take` against their
 * own conditions; an aborted `take` never consumes a token.
 */
export interface TokenQueue extends AsyncIterable<Token> {
  readonly size: number
  readonly capacity: number
  readonly closed: boolean
  take(options?: WaitOptions): Promise<Token>
  poll(): Token | undefined
}

export interface Lexer extends AsyncIterable<Token> {
  readonly tokens: TokenQueue
  readonly closed: boolean
  feed(byte: number): Promise<void>
  write(input: Uint8Array | string): Promise<void>
  nextToken(options?: WaitOptions): Promise<Token>
  poll(): Token | undefined
  shutdown(): Promise<void>
}
