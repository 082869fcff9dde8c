import { LexerConfigurationError } from '../errors'
import type {
  LexerOptions,
  ResolvedLexerOptions,
  StateMachineOptions,
} from '../types'

export const DEFAULT_QUEUE_CAPACITY = 10
export const DEFAULT_MAX_PARAM_VALUE = 65535

const requireCapacity = (name: string, value: number | undefined): number => {
  if (value === undefined) {
    return DEFAULT_QUEUE_CAPACITY
  }
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new LexerConfigurationError(
      `${name} must be a positive integer, got ${value}`,
    )
  }
  return value
}

export const resolveMaxParamValue = (options: StateMachineOptions): number => {
  const { maxParamValue } = options
  if (maxParamValue === undefined) {
    return DEFAULT_MAX_PARAM_VALUE
  }
  if (!Number.isSafeInteger(maxParamValue) || maxParamValue < 0) {
    throw new LexerConfigurationError(
      `maxParamValue must be a non-negative integer, got ${maxParamValue}`,
    )
  }
  return maxParamValue
}

export const resolveLexerOptions = (
  options: LexerOptions,
): ResolvedLexerOptions => ({
  inboundCapacity: requireCapacity('inboundCapacity', options.inboundCapacity),
  outboundCapacity: requireCapacity(
    'outboundCapacity',
    options.outboundCapacity,
  ),
  maxParamValue: resolveMaxParamValue(options),
  onDiagnostic: options.onDiagnostic,
})
