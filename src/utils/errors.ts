/**
 * Central error classes and validation utilities for the recording matcher
 * @module utils/errors
 */

/**
 * Base error class for all matcher errors
 */
export class MeetingMatcherError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'MeetingMatcherError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends MeetingMatcherError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when matcher configuration is invalid
 */
export class ConfigurationError extends MeetingMatcherError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when the scraped record list cannot be read at all.
 * Problems with individual records are reported as warnings instead.
 */
export class InputValidationError extends MeetingMatcherError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Invalid metadata input: ${reason}`, 'INPUT_VALIDATION_ERROR', context)
    this.name = 'InputValidationError'
  }
}

/**
 * Error thrown when the export directory itself cannot be scanned
 */
export class FileIndexError extends MeetingMatcherError {
  public readonly directory: string

  constructor(directory: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Cannot index directory '${directory}': ${reason}`,
      'FILE_INDEX_ERROR',
      { directory, reason, ...context }
    )
    this.name = 'FileIndexError'
    this.directory = directory
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Validates that two numbers satisfy a less-than relationship
 */
export function requireLessThan(
  value: number,
  otherValue: number,
  parameterName: string,
  otherParameterName: string
): void {
  if (value >= otherValue) {
    throw new ConfigurationError(
      `${parameterName} (${value}) must be less than ${otherParameterName} (${otherValue})`
    )
  }
}

/**
 * Check if an error is a matcher error
 */
export function isMeetingMatcherError(error: unknown): error is MeetingMatcherError {
  return error instanceof MeetingMatcherError
}
