import { describe, expect, it } from 'vitest'
import { TokenValue } from '../catalog'
import { LexerConfigurationError } from '../errors'
import { VT100_GRAMMAR, buildGrammar } from './grammar'

const emptySource = {
  escape: {},
  pound: {},
  leftParen: {},
  rightParen: {},
  escapeDigit: {},
  bracket: {},
  parameterized: {},
}

describe('buildGrammar', () => {
  it('loads the VT100 tables keyed by byte', () => {
    expect(VT100_GRAMMAR.escape.get(0x44)).toBe(TokenValue.Index)
    expect(VT100_GRAMMAR.pound.get(0x38)).toBe(TokenValue.Align)
    expect(VT100_GRAMMAR.leftParen.get(0x41)).toBe(TokenValue.SetUKG0)
    expect(VT100_GRAMMAR.rightParen.get(0x32)).toBe(TokenValue.SetAltSpecG1)
    expect(VT100_GRAMMAR.escapeDigit.get('6n')).toBe(TokenValue.GetCursor)
    expect(VT100_GRAMMAR.bracket.get(0x79)?.get('2;10y')).toBe(
      TokenValue.TestLBRep,
    )
    expect(VT100_GRAMMAR.parameterized.get(0x72)).toEqual({
      shape: 'pair',
      token: TokenValue.SetWin,
    })
  })

  it('rejects unknown token names', () => {
    expect(() =>
      buildGrammar({ ...emptySource, escape: { D: 'Indx' } }),
    ).toThrow(LexerConfigurationError)
  })

  it('rejects multi-byte keys in single-byte tables', () => {
    expect(() =>
      buildGrammar({ ...emptySource, pound: { '38': 'Align' } }),
    ).toThrow('Grammar table pound expects single-byte keys, got "38"')
  })

  it('rejects bodies that do not end with their terminator', () => {
    expect(() =>
      buildGrammar({ ...emptySource, bracket: { m: { '1K': 'Bold' } } }),
    ).toThrow('Grammar body "1K" does not end with its terminator "m"')
  })

  it('rejects unknown parameter shapes', () => {
    expect(() =>
      buildGrammar({
        ...emptySource,
        parameterized: { A: { shape: 'triple', token: 'CursorUp' } },
      }),
    ).toThrow(LexerConfigurationError)
  })
})
