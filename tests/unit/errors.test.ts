import { describe, it, expect } from 'vitest'
import {
  MeetingMatcherError,
  InvalidParameterError,
  ConfigurationError,
  FileIndexError,
  InputValidationError,
  requirePositive,
  requireInRange,
  requireNonEmptyArray,
  requireOneOf,
  requireLessThan,
  isMeetingMatcherError,
} from '../../src/utils/errors'

describe('error classes', () => {
  it('carries a code and context', () => {
    const error = new FileIndexError('/exports', 'not a directory')

    expect(error).toBeInstanceOf(MeetingMatcherError)
    expect(error.name).toBe('FileIndexError')
    expect(error.code).toBe('FILE_INDEX_ERROR')
    expect(error.directory).toBe('/exports')
    expect(error.context).toEqual({ directory: '/exports', reason: 'not a directory' })
  })

  it('names the configuration field', () => {
    const error = new ConfigurationError('bad band', 'thresholds')
    expect(error.code).toBe('CONFIGURATION_ERROR')
    expect(error.field).toBe('thresholds')
  })

  it('formats input errors', () => {
    expect(new InputValidationError('empty').message).toBe('Invalid metadata input: empty')
  })

  it('recognizes matcher errors', () => {
    expect(isMeetingMatcherError(new InvalidParameterError('x', 1, 'bad'))).toBe(true)
    expect(isMeetingMatcherError(new Error('plain'))).toBe(false)
  })
})

describe('validation helpers', () => {
  it('requirePositive', () => {
    expect(requirePositive(3, 'count')).toBe(3)
    expect(() => requirePositive(0, 'count')).toThrow(
      "Invalid parameter 'count': must be positive (> 0)"
    )
    expect(() => requirePositive(NaN, 'count')).toThrow(InvalidParameterError)
  })

  it('requireInRange', () => {
    expect(requireInRange(0, 0, 1, 'ratio')).toBe(0)
    expect(requireInRange(1, 0, 1, 'ratio')).toBe(1)
    expect(() => requireInRange(1.01, 0, 1, 'ratio')).toThrow(InvalidParameterError)
  })

  it('requireNonEmptyArray', () => {
    expect(requireNonEmptyArray(['mp3'], 'ext')).toEqual(['mp3'])
    expect(() => requireNonEmptyArray([], 'ext')).toThrow("Invalid parameter 'ext': must not be empty")
  })

  it('requireOneOf', () => {
    expect(requireOneOf('audio', ['audio', 'complete'], 'policy')).toBe('audio')
    expect(() => requireOneOf('video', ['audio', 'complete'], 'policy')).toThrow(
      "Invalid parameter 'policy': must be one of: audio, complete"
    )
  })

  it('requireLessThan', () => {
    expect(() => requireLessThan(0.3, 0.6, 'min', 'max')).not.toThrow()
    expect(() => requireLessThan(0.6, 0.6, 'min', 'max')).toThrow(ConfigurationError)
  })
})
