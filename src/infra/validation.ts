/**
 * CONFIGURATION VALIDATION
 *
 * Structural checks are done by the zod schemas in config/config.ts. The
 * validators below cover the rules a schema cannot express on its own and
 * report every problem at once instead of stopping at the first.
 */

import { ZodIssue } from 'zod';
import { ENDPOINT_NAMES, isEndpointName } from '../domain/types';

/**
 * Validation error with detailed context
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly constraints?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a configuration cannot be built. Never reaches a running loop.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly ValidationError[] = []
  ) {
    super(
      errors.length > 0
        ? `${message}: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`
        : message
    );
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A weight or error-rate key with no matching endpoint builder
 */
export class UnknownEndpointError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly field: string = 'endpoint'
  ) {
    super(`Unknown endpoint '${endpoint}' in ${field} (known: ${ENDPOINT_NAMES.join(', ')})`);
    this.name = 'UnknownEndpointError';
    Object.setPrototypeOf(this, UnknownEndpointError.prototype);
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function toResult(errors: ValidationError[]): ValidationResult {
  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Convert zod issues into validation errors
 */
export function fromZodIssues(issues: readonly ZodIssue[]): ValidationError[] {
  return issues.map(
    (issue) =>
      new ValidationError(issue.message, issue.path.join('.') || '(root)', undefined, {
        code: issue.code,
      })
  );
}

/**
 * Throw on the first key that is not a known endpoint
 */
export function assertKnownEndpoints(table: Record<string, unknown>, field: string): void {
  for (const key of Object.keys(table)) {
    if (!isEndpointName(key)) {
      throw new UnknownEndpointError(key, field);
    }
  }
}

/**
 * Validate request rate (requests per second)
 */
export function validateRate(rps: number): ValidationResult {
  const errors: ValidationError[] = [];

  if (!Number.isFinite(rps) || rps <= 0) {
    errors.push(
      new ValidationError('Rate must be a positive number', 'rps', rps, {
        min: 0,
        exclusive: true,
      })
    );
  }

  return toResult(errors);
}

/**
 * Validate endpoint weights: at least one entry, non-negative values, positive total
 */
export function validateWeights(weights: Record<string, number>): ValidationResult {
  const errors: ValidationError[] = [];
  const entries = Object.entries(weights);

  if (entries.length === 0) {
    errors.push(
      new ValidationError('Weights must contain at least one endpoint', 'weights', weights, {
        minEntries: 1,
      })
    );
    return toResult(errors);
  }

  for (const [name, weight] of entries) {
    if (!Number.isFinite(weight) || weight < 0) {
      errors.push(
        new ValidationError('Weight must be a non-negative number', `weights.${name}`, weight, {
          min: 0,
        })
      );
    }
  }

  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  if (errors.length === 0 && total <= 0) {
    errors.push(
      new ValidationError('Weights must sum to a positive number', 'weights', weights, {
        sum: total,
      })
    );
  }

  return toResult(errors);
}

/**
 * Validate per-endpoint error probabilities
 */
export function validateErrorRates(errorRates: Record<string, number>): ValidationResult {
  const errors: ValidationError[] = [];

  for (const [name, rate] of Object.entries(errorRates)) {
    if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
      errors.push(
        new ValidationError(
          'Error rate must be a probability between 0 and 1',
          `errorRates.${name}`,
          rate,
          { min: 0, max: 1 }
        )
      );
    }
  }

  return toResult(errors);
}

/**
 * Validate summary interval (0 disables periodic summaries)
 */
export function validateSummaryInterval(seconds: number): ValidationResult {
  const errors: ValidationError[] = [];

  if (!Number.isFinite(seconds) || seconds < 0) {
    errors.push(
      new ValidationError(
        'Summary interval cannot be negative',
        'summaryIntervalSeconds',
        seconds,
        { min: 0 }
      )
    );
  }

  return toResult(errors);
}

/**
 * Validate run duration, when one is given
 */
export function validateDuration(seconds: number | undefined): ValidationResult {
  const errors: ValidationError[] = [];

  if (seconds !== undefined && (!Number.isFinite(seconds) || seconds <= 0)) {
    errors.push(
      new ValidationError('Duration must be a positive number of seconds', 'durationSeconds', seconds, {
        min: 0,
        exclusive: true,
      })
    );
  }

  return toResult(errors);
}

/**
 * Combine multiple validation results
 */
export function combineValidationResults(...results: ValidationResult[]): ValidationResult {
  return toResult(results.flatMap((r) => r.errors));
}
