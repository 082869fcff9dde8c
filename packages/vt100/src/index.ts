/** biome-ignore-all lint/performance/noBarrelFile: Library */

export type { CatalogValue } from './catalog'
export {
  TOKEN_COUNT,
  TokenValue,
  isNamedValue,
  isRawCharacter,
  nameOf,
  tokenNames,
  valueOf,
} from './catalog'

export { classifyByte } from './classifier'

export {
  LexerClosedError,
  LexerConfigurationError,
  LexerError,
} from './errors'

export { createLexer } from './lexer'
export { createStateMachine } from './machine'

export type {
  DiscardReason,
  Lexer,
  LexerDiagnosticEvent,
  LexerOptions,
  SequenceDiscard,
  StateMachine,
  StateMachineOptions,
  Token,
  TokenQueue,
  TokenSink,
  WaitOptions,
} from './types'
export { ByteFlag, LexerState } from './types'

export { formatToken } from './utils/format-token'
