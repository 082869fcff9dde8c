import { describe, expect, it } from 'vitest'
import { LexerClosedError } from '../errors'
import { BoundedQueue } from './bounded-queue'

describe('BoundedQueue', () => {
  it('delivers values in FIFO order', async () => {
    const queue = new BoundedQueue<number>(4)
    await queue.put(1)
    await queue.put(2)

    expect(queue.size).toBe(2)
    await expect(queue.take()).resolves.toBe(1)
    expect(queue.poll()).toBe(2)
    expect(queue.poll()).toBeUndefined()
  })

  it('hands a value directly to a waiting taker', async () => {
    const queue = new BoundedQueue<string>(1)
    const pending = queue.take()

    await queue.put('a')

    await expect(pending).resolves.toBe('a')
    expect(queue.size).toBe(0)
  })

  it('makes producers wait while the queue is full', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)

    let admitted = false
    const blocked = queue.put(2).then(() => {
      admitted = true
    })
    await Promise.resolve()
    expect(admitted).toBe(false)
    expect(queue.size).toBe(1)

    expect(queue.poll()).toBe(1)
    await blocked
    expect(admitted).toBe(true)
    expect(queue.poll()).toBe(2)
  })

  it('gives each value to exactly one of several takers', async () => {
    const queue = new BoundedQueue<number>(2)
    const first = queue.take()
    const second = queue.take()

    await queue.put(10)
    await queue.put(20)

    await expect(Promise.all([first, second])).resolves.toEqual([10, 20])
    expect(queue.size).toBe(0)
  })

  it('does not consume a value for an aborted take', async () => {
    const queue = new BoundedQueue<number>(2)
    const controller = new AbortController()
    const abandoned = queue.take({ signal: controller.signal })

    controller.abort(new Error('gave up'))
    await expect(abandoned).rejects.toThrow('gave up')

    await queue.put(7)
    expect(queue.poll()).toBe(7)
  })

  it('rejects immediately when the signal is already aborted', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)

    await expect(
      queue.take({ signal: AbortSignal.abort(new Error('late')) }),
    ).rejects.toThrow('late')
    expect(queue.size).toBe(1)
  })

  it('withdraws an aborted put', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)
    const controller = new AbortController()
    const blocked = queue.put(2, { signal: controller.signal })

    controller.abort(new Error('stop'))
    await expect(blocked).rejects.toThrow('stop')

    expect(queue.poll()).toBe(1)
    expect(queue.poll()).toBeUndefined()
  })

  it('rejects pending waiters on close', async () => {
    const taking = new BoundedQueue<number>(1)
    const waitingTake = taking.take()
    taking.close()
    await expect(waitingTake).rejects.toBeInstanceOf(LexerClosedError)

    const putting = new BoundedQueue<number>(1)
    await putting.put(1)
    const waitingPut = putting.put(2)
    putting.close()
    await expect(waitingPut).rejects.toBeInstanceOf(LexerClosedError)
    await expect(putting.put(3)).rejects.toBeInstanceOf(LexerClosedError)
  })

  it('keeps buffered values readable after close', async () => {
    const queue = new BoundedQueue<number>(2)
    await queue.put(1)
    queue.close()

    await expect(queue.take()).resolves.toBe(1)
    await expect(queue.take()).rejects.toBeInstanceOf(LexerClosedError)
  })

  it('records the close reason as the error cause', async () => {
    const queue = new BoundedQueue<number>(1)
    const reason = new Error('worker died')
    queue.close(reason)

    const error = await queue.take().catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(LexerClosedError)
    expect(error).toHaveProperty('cause', reason)
  })

  it('drains buffered values', async () => {
    const queue = new BoundedQueue<number>(3)
    await queue.put(1)
    await queue.put(2)

    expect(queue.drain()).toEqual([1, 2])
    expect(queue.size).toBe(0)
  })

  it('iterates until closed', async () => {
    const queue = new BoundedQueue<number>(3)
    await queue.put(1)
    await queue.put(2)
    queue.close()

    const seen: number[] = []
    for await (const value of queue) {
      seen.push(value)
    }
    expect(seen).toEqual([1, 2])
  })

  it('rejects iteration when closed with a reason', async () => {
    const queue = new BoundedQueue<number>(2)
    const reason = new Error('worker died')
    await queue.put(1)
    queue.close(reason)

    const seen: number[] = []
    const error = await (async () => {
      for await (const value of queue) {
        seen.push(value)
      }
    })().catch((caught: unknown) => caught)

    expect(seen).toEqual([1])
    expect(error).toBeInstanceOf(LexerClosedError)
    expect(error).toHaveProperty('cause', reason)
  })

  it('counts puts waiting for room', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)
    const waiting = queue.put(2)

    expect(queue.waitingPuts).toBe(1)
    expect(queue.poll()).toBe(1)
    await waiting
    expect(queue.waitingPuts).toBe(0)
    expect(queue.size).toBe(1)
  })
})
