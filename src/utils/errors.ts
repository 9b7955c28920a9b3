/**
 * Central error classes and validation utilities for roster-canon
 * @module utils/errors
 */

/**
 * Base error class for all roster-canon errors
 */
export class RosterCanonError extends Error {
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
    this.name = 'RosterCanonError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (V8 specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends RosterCanonError {
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
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends RosterCanonError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is a positive integer (> 0)
 */
export function requirePositiveInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
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
 * Check if an error is a roster-canon error
 */
export function isRosterCanonError(error: unknown): error is RosterCanonError {
  return error instanceof RosterCanonError
}

/**
 * Renders an unknown thrown value as a message string
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
