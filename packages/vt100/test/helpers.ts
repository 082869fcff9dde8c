import type { SequenceDiscard, Token, TokenSink } from '../src/types'

export function invariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new Error(message)
  }
}

export class CollectingSink implements TokenSink {
  readonly tokens: Token[] = []
  readonly discards: SequenceDiscard[] = []

  onToken(token: Token): void {
    this.tokens.push(token)
  }

  onDiscard(discard: SequenceDiscard): void {
    this.discards.push(discard)
  }
}

export const bytesOf = (text: string): number[] =>
  Array.from(text, (char) => char.charCodeAt(0))

/** Let every queued microtask and timer callback run. */
export const settle = (ms = 10): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })

export const withinMs = <T>(promise: Promise<T>, ms: number): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Timed out after ${ms}ms`))
    }, ms)
    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      },
    )
  })
