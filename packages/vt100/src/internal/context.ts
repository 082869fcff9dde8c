import { LexerState } from '../types'

/**
 * Mutable recognizer state. Owned by exactly one state machine, which is in
 * turn owned by exactly one lexer worker.
 */
export interface LexerContext {
  state: LexerState
  /** Bytes since leaving Ground, ESC first. Empty while in Ground. */
  sequence: number[]
  /** Set once the sequence outgrew its limit; later bytes were not kept. */
  truncated: boolean
}

export const createInitialContext = (): LexerContext => ({
  state: LexerState.Ground,
  sequence: [],
  truncated: false,
})
