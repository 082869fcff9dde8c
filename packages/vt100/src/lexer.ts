import { LexerClosedError } from './errors'
import { BoundedQueue } from './internal/bounded-queue'
import { resolveLexerOptions } from './internal/resolve-options'
import { createStateMachine } from './machine'
import type {
  Lexer,
  LexerDiagnosticEvent,
  LexerOptions,
  ResolvedLexerOptions,
  StateMachine,
  Token,
  TokenQueue,
  TokenSink,
  WaitOptions,
} from './types'

const MAX_BYTE = 0xff

class LexerImpl implements Lexer {
  private readonly options: ResolvedLexerOptions
  private readonly machine: StateMachine
  private readonly inbound: BoundedQueue<number>
  private readonly outbound: BoundedQueue<Token>
  private readonly rundown = new AbortController()
  private readonly encoder = new TextEncoder()
  private readonly worker: Promise<void>
  private failure: { readonly error: unknown } | null = null
  private shutdownPromise: Promise<void> | null = null
  private closing = false

  constructor(options: ResolvedLexerOptions) {
    this.options = options
    this.machine = createStateMachine({ maxParamValue: options.maxParamValue })
    this.inbound = new BoundedQueue(options.inboundCapacity)
    this.outbound = new BoundedQueue(options.outboundCapacity)
    this.worker = this.run()
  }

  get tokens(): TokenQueue {
    return this.outbound
  }

  get closed(): boolean {
    return this.closing
  }

  feed(byte: number): Promise<void> {
    if (this.closing) {
      return Promise.reject(this.closedError())
    }
    if (!Number.isInteger(byte) || byte < 0 || byte > MAX_BYTE) {
      return Promise.reject(
        new RangeError(`Expected a byte value between 0 and 255, got ${byte}`),
      )
    }
    return this.inbound.put(byte)
  }

  async write(input: Uint8Array | string): Promise<void> {
    const buffer =
      typeof input === 'string' ? this.encoder.encode(input) : input
    for (const byte of buffer) {
      await this.feed(byte)
    }
  }

  nextToken(options: WaitOptions = {}): Promise<Token> {
    if (this.closing) {
      return Promise.reject(this.closedError())
    }
    return this.outbound.take(options)
  }

  poll(): Token | undefined {
    return this.outbound.poll()
  }

  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.stopWorker()
    return this.shutdownPromise
  }

  [Symbol.asyncIterator](): AsyncIterator<Token> {
    return this.outbound[Symbol.asyncIterator]()
  }

  private async stopWorker(): Promise<void> {
    this.closing = true
    this.rundown.abort(new LexerClosedError())
    await this.worker

    const pendingInput = this.inbound.size + this.inbound.waitingPuts
    this.inbound.close()
    this.outbound.close()
    this.inbound.drain()
    this.outbound.drain()

    this.report({ type: 'worker_stopped', timestamp: Date.now(), pendingInput })

    if (this.failure) {
      throw this.failure.error
    }
  }

  /**
   * Sole owner of the state machine. Waits for a byte or the rundown signal,
   * steps the machine, and forwards any token before reading the next byte.
   */
  private async run(): Promise<void> {
    const { signal } = this.rundown
    const pending: Token[] = []
    const sink: TokenSink = {
      onToken: (token) => {
        pending.push(token)
      },
      onDiscard: (discard) => {
        this.report({
          type: 'sequence_discarded',
          timestamp: Date.now(),
          ...discard,
        })
      },
    }

    try {
      while (!signal.aborted) {
        const byte = await this.inbound.take({ signal })
        this.machine.write(byte, sink)
        for (const token of pending.splice(0)) {
          await this.outbound.put(token, { signal })
        }
      }
    } catch (error) {
      if (signal.aborted && error === signal.reason) {
        return
      }
      // Surface the failure to every waiter now and to shutdown() later.
      this.failure = { error }
      this.closing = true
      this.inbound.close(error)
      this.outbound.close(error)
    }
  }

  private report(event: LexerDiagnosticEvent): void {
    this.options.onDiagnostic?.(event)
  }

  private closedError(): LexerClosedError {
    return this.failure
      ? new LexerClosedError('Lexer worker failed', {
          cause: this.failure.error,
        })
      : new LexerClosedError()
  }
}

/**
 * Start a lexer: one background worker reading bytes from a bounded inbound
 * queue and writing tokens to a bounded outbound queue. Call `shutdown()` to
 * stop the worker; it does not drain bytes still queued.
 *
 * @example
 * const lexer = createLexer()
 * await lexer.write('\u001b[13;17H')
 * const token = await lexer.nextToken({ signal: AbortSignal.timeout(100) })
 * // token.value === TokenValue.CursorPos, token.params => [13, 17]
 * await lexer.shutdown()
 */
export const createLexer = (options: LexerOptions = {}): Lexer =>
  new LexerImpl(resolveLexerOptions(options))
