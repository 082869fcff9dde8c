import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { classifyByte } from '../src/classifier'
import { ByteFlag } from '../src/types'

const computeExpectedFlags = (input: number): number => {
  const value = input & 0x7f
  let flags = ByteFlag.None

  if (value <= 0x1f) flags |= ByteFlag.Control
  if (value === 0x1b) flags |= ByteFlag.Escape
  if (value === 0x20) flags |= ByteFlag.Space
  if (value >= 0x21 && value <= 0x7e) flags |= ByteFlag.Printable
  if (value >= 0x30 && value <= 0x39) flags |= ByteFlag.Digit
  if (
    (value >= 0x41 && value <= 0x5a) ||
    (value >= 0x61 && value <= 0x7a)
  ) {
    flags |= ByteFlag.Letter
  }
  if (value === 0x7f) flags |= ByteFlag.Delete

  return flags
}

describe('classifyByte', () => {
  it('classifies representative bytes', () => {
    expect(classifyByte(0x1b)).toBe(ByteFlag.Control | ByteFlag.Escape)
    expect(classifyByte(0x20)).toBe(ByteFlag.Space)
    expect(classifyByte(0x35)).toBe(ByteFlag.Printable | ByteFlag.Digit)
    expect(classifyByte(0x48)).toBe(ByteFlag.Printable | ByteFlag.Letter)
    expect(classifyByte(0x3b)).toBe(ByteFlag.Printable)
    expect(classifyByte(0x7f)).toBe(ByteFlag.Delete)
  })

  it('strips the high bit before classifying', () => {
    expect(classifyByte(0x9b)).toBe(classifyByte(0x1b))
    expect(classifyByte(0xc8)).toBe(classifyByte(0x48))
  })

  it('matches the 7-bit ranges for the entire byte range', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0x00, max: 0xff }), (value) => {
        expect(classifyByte(value)).toBe(computeExpectedFlags(value))
      }),
      { numRuns: 1024 },
    )
  })

  it('never returns None', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0x00, max: 0xff }), (value) => {
        expect(classifyByte(value)).not.toBe(ByteFlag.None)
      }),
      { numRuns: 512 },
    )
  })
})
