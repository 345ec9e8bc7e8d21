/**
 * Error types for the metrics core.
 *
 * Every error here is a programmer or configuration error raised
 * synchronously at the offending call (construction, registration,
 * labeling or update). None of them is transient.
 */

/**
 * Error category for classification
 */
export type ErrorCategory = 'configuration' | 'validation' | 'registration';

/**
 * Base error class for all metrics errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid registry options
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly issues: readonly string[];

  constructor(
    message: string,
    options?: { issues?: readonly string[] | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.issues = options?.issues ?? [];
  }
}

/**
 * Metric or label name fails the identifier grammar, is reserved,
 * or is declared twice.
 */
export class InvalidNameError extends MetricsError {
  readonly category = 'validation' as const;

  constructor(
    readonly invalidName: string,
    readonly reason: string
  ) {
    super(`Invalid name "${invalidName}": ${reason}`);
  }
}

/**
 * Caller supplied a different number (or set) of label values than declared
 */
export class LabelCardinalityMismatchError extends MetricsError {
  readonly category = 'validation' as const;

  constructor(
    readonly metricName: string,
    readonly expected: readonly string[],
    readonly received: number | readonly string[]
  ) {
    const got = typeof received === 'number' ? String(received) : `[${received.join(', ')}]`;
    super(
      `Label mismatch for metric "${metricName}": ` +
        `expected ${expected.length} (${expected.join(', ')}), got ${got}`
    );
  }
}

/**
 * Rejected value - negative counter increment, non-numeric observation,
 * or an invalid bucket layout.
 */
export class InvalidValueError extends MetricsError {
  readonly category = 'validation' as const;
  readonly metricName?: string;

  constructor(message: string, options?: { metricName?: string | undefined }) {
    super(message);
    if (options?.metricName !== undefined) {
      this.metricName = options.metricName;
    }
  }
}

/**
 * Registry already holds a collector for this name
 */
export class DuplicateNameError extends MetricsError {
  readonly category = 'registration' as const;

  constructor(
    readonly metricName: string,
    detail?: string
  ) {
    super(
      `Metric "${metricName}" is already registered` + (detail ? `: ${detail}` : '')
    );
  }
}

/**
 * Lookup or unregister of a collector the registry does not hold
 */
export class UnknownCollectorError extends MetricsError {
  readonly category = 'registration' as const;

  constructor(readonly metricName: string) {
    super(`No collector registered for "${metricName}"`);
  }
}

/**
 * Check if an error is a metrics error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Get the error category from an error
 */
export function getErrorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MetricsError) {
    return error.category;
  }
  return undefined;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    return [`[${error.category.toUpperCase()}]`, `${error.name}:`, error.message].join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
