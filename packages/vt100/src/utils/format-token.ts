import { nameOf } from '../catalog'
import type { Token } from '../types'

const toHex = (byte: number): string => byte.toString(16).padStart(2, '0')

/**
 * Render a token for log lines, e.g.
 * `CursorPos params=[13, 17] raw=1b 5b 31 33 3b 31 37 48`.
 */
export const formatToken = (token: Token): string => {
  const params = token.params.join(', ')
  const raw = Array.from(token.raw, toHex).join(' ')
  return `${nameOf(token.value)} params=[${params}] raw=${raw}`
}
