/**
 * Base error class for lexer faults. Malformed input never raises one of
 * these; it is discarded by the state machine.
 */
export class LexerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LexerError'
  }
}

/**
 * Raised at module load when the token catalog or grammar tables are
 * inconsistent, and at construction when options are out of range. These
 * indicate programming errors and are not retried.
 */
export class LexerConfigurationError extends LexerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LexerConfigurationError'
  }
}

/**
 * Raised when a lexer or one of its queues is used after `shutdown()`.
 */
export class LexerClosedError extends LexerError {
  constructor(message = 'Lexer has been shut down', options?: ErrorOptions) {
    super(message, options)
    this.name = 'LexerClosedError'
  }
}
