/**
 * Configuration for metrics registries.
 *
 * Options are validated with a zod schema; every failure is reported as a
 * ConfigurationError listing each offending field.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { isValidLabelName, isValidMetricName } from '../labels/validation';
import { createLogger, type Logger } from '../observability/logging';
import type { Labels } from '../types';

/**
 * Default number of series a family may hold before a warning is logged.
 */
export const DEFAULT_CARDINALITY_WARNING_LIMIT = 1000;

/**
 * Options accepted by a MetricsRegistry.
 */
export interface RegistryOptions {
  /** Labels appended to every collected sample */
  defaultLabels?: Labels;
  /** Series count above which a family is reported (default: 1000) */
  cardinalityWarningLimit?: number;
  /** Per-family overrides of `cardinalityWarningLimit`, keyed by metric name */
  cardinalityWarningLimits?: Record<string, number>;
  /** Logger for registration events and cardinality warnings */
  logger?: Logger;
}

/**
 * Fully resolved registry configuration.
 */
export interface RegistryConfig {
  readonly defaultLabels: Readonly<Labels>;
  readonly cardinalityWarningLimit: number;
  readonly cardinalityWarningLimits: Readonly<Record<string, number>>;
  readonly logger: Logger;
}

const limitSchema = z.number().int().positive();

const optionsSchema = z.object({
  defaultLabels: z
    .record(
      z.string().refine(isValidLabelName, {
        message: 'label names must match [a-zA-Z_][a-zA-Z0-9_]* and must not start with "__"',
      }).refine((name) => name !== 'le', { message: 'label name "le" is reserved' }),
      z.string()
    )
    .default({}),
  cardinalityWarningLimit: limitSchema.default(DEFAULT_CARDINALITY_WARNING_LIMIT),
  cardinalityWarningLimits: z
    .record(
      z.string().refine(isValidMetricName, {
        message: 'metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*',
      }),
      limitSchema
    )
    .default({}),
});

/**
 * Validate `options` and fill in defaults.
 *
 * @throws ConfigurationError if any option is invalid
 */
export function resolveRegistryConfig(options: RegistryOptions = {}): RegistryConfig {
  const { logger, ...rest } = options;
  const result = optionsSchema.safeParse(rest);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid registry configuration: ${issues.join('; ')}`, {
      issues,
      cause: result.error,
    });
  }

  return {
    defaultLabels: Object.freeze({ ...result.data.defaultLabels }),
    cardinalityWarningLimit: result.data.cardinalityWarningLimit,
    cardinalityWarningLimits: Object.freeze({ ...result.data.cardinalityWarningLimits }),
    logger: logger ?? createLogger(),
  };
}
