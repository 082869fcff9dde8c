import { LexerClosedError } from '../errors'
import type { WaitOptions } from '../types'

interface PendingTaker<T> {
  resolve(value: T): void
  reject(reason: unknown): void
}

interface PendingPutter<T> {
  readonly value: T
  resolve(): void
  reject(reason: unknown): void
}

/**
 * Bounded async FIFO. `put` waits while the queue is full, `take` waits while
 * it is empty, and either wait can be abandoned through an `AbortSignal`
 * without losing or duplicating a value. Each value reaches exactly one taker.
 */
export class BoundedQueue<T extends NonNullable<unknown>>
  implements AsyncIterable<T>
{
  readonly capacity: number
  #buffer: T[] = []
  #takers: PendingTaker<T>[] = []
  #putters: PendingPutter<T>[] = []
  #closed = false
  #closeReason: unknown = undefined

  constructor(capacity: number) {
    this.capacity = capacity
  }

  get size(): number {
    return this.#buffer.length
  }

  get closed(): boolean {
    return this.#closed
  }

  /** Values held by `put` calls still waiting for room. */
  get waitingPuts(): number {
    return this.#putters.length
  }

  put(value: T, options: WaitOptions = {}): Promise<void> {
    if (this.#closed) {
      return Promise.reject(this.#closedError())
    }

    const taker = this.#takers.shift()
    if (taker) {
      taker.resolve(value)
      return Promise.resolve()
    }

    if (this.#buffer.length < this.capacity) {
      this.#buffer.push(value)
      return Promise.resolve()
    }

    return this.#wait<void>(options.signal, (resolve, reject) => {
      const putter: PendingPutter<T> = {
        value,
        resolve: () => resolve(),
        reject,
      }
      this.#putters.push(putter)
      return () => remove(this.#putters, putter)
    })
  }

  take(options: WaitOptions = {}): Promise<T> {
    const buffered = this.#shift()
    if (buffered !== undefined) {
      return Promise.resolve(buffered)
    }
    if (this.#closed) {
      return Promise.reject(this.#closedError())
    }

    return this.#wait<T>(options.signal, (resolve, reject) => {
      const taker: PendingTaker<T> = { resolve, reject }
      this.#takers.push(taker)
      return () => remove(this.#takers, taker)
    })
  }

  poll(): T | undefined {
    return this.#shift()
  }

  /**
   * Reject every pending `put` and `take`. Values already buffered stay
   * available to `take`, `poll` and `drain`.
   */
  close(reason?: unknown): void {
    if (this.#closed) return
    this.#closed = true
    this.#closeReason = reason
    const error = this.#closedError()
    for (const taker of this.#takers.splice(0)) {
      taker.reject(error)
    }
    for (const putter of this.#putters.splice(0)) {
      putter.reject(error)
    }
  }

  drain(): T[] {
    const drained = this.#buffer.splice(0)
    // Capacity just freed up; closed queues have no putters left.
    while (this.#putters.length > 0 && this.#buffer.length < this.capacity) {
      this.#admitPutter()
    }
    return drained
  }

  /**
   * Iterate until the queue is closed and empty. A plain `close()` ends the
   * loop; a close with a reason rejects it with the `LexerClosedError`.
   */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async (): Promise<IteratorResult<T>> => {
        try {
          return { value: await this.take(), done: false }
        } catch (error) {
          if (
            error instanceof LexerClosedError &&
            this.#closeReason === undefined
          ) {
            return { value: undefined, done: true }
          }
          throw error
        }
      },
    }
  }

  #shift(): T | undefined {
    const value = this.#buffer.shift()
    if (value !== undefined) {
      this.#admitPutter()
    }
    return value
  }

  #admitPutter(): void {
    const putter = this.#putters.shift()
    if (!putter) {
      return
    }
    this.#buffer.push(putter.value)
    putter.resolve()
  }

  #closedError(): LexerClosedError {
    return new LexerClosedError('Queue has been closed', {
      cause: this.#closeReason,
    })
  }

  #wait<R>(
    signal: AbortSignal | undefined,
    enqueue: (
      resolve: (value: R) => void,
      reject: (reason: unknown) => void,
    ) => () => void,
  ): Promise<R> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason)
    }

    return new Promise<R>((resolve, reject) => {
      const onAbort = (): void => {
        dequeue()
        reject(signal?.reason)
      }
      const dequeue = enqueue(
        (value) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(value)
        },
        (reason) => {
          signal?.removeEventListener('abort', onAbort)
          reject(reason)
        },
      )
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}

const remove = <T>(list: T[], item: T): void => {
  const index = list.indexOf(item)
  if (index !== -1) {
    list.splice(index, 1)
  }
}
