import { z } from 'zod';
import { EndpointName, EndpointTable, Result, fail, ok } from '../domain/types';
import {
  ConfigurationError,
  assertKnownEndpoints,
  combineValidationResults,
  fromZodIssues,
  validateErrorRates,
  validateRate,
  validateSummaryInterval,
  validateWeights,
} from '../infra/validation';

export type SummaryMode = 'cumulative' | 'windowed';

/**
 * Generator configuration as supplied by callers, files and presets
 */
export interface TrafficConfigInput {
  /**
   * Target base address, either a full URL or host:port
   */
  target: string;

  /**
   * Requests per second
   */
  rps?: number;

  /**
   * Free-form label, sent in tracing headers
   */
  trafficType?: string;

  weights: Partial<Record<EndpointName, number>>;

  /**
   * Per-endpoint error injection probability, 0 when absent
   */
  errorRates?: Partial<Record<EndpointName, number>>;

  timeoutSeconds?: number;

  /**
   * Seconds between periodic summaries, 0 disables them
   */
  summaryIntervalSeconds?: number;

  summaryMode?: SummaryMode;

  /**
   * Maximum number of cycles in flight at once
   */
  concurrency?: number;

  /**
   * Extra headers, merged over the defaults
   */
  headers?: Record<string, string>;

  /**
   * Seed for reproducible endpoint selection and error injection
   */
  seed?: number;
}

/**
 * Validated, immutable configuration read by the pacing loop
 */
export interface TrafficConfig {
  readonly target: string;
  readonly baseUrl: string;
  readonly rps: number;
  readonly trafficType: string;
  readonly weights: EndpointTable;
  readonly errorRates: EndpointTable;
  readonly timeoutSeconds: number;
  readonly summaryIntervalSeconds: number;
  readonly summaryMode: SummaryMode;
  readonly concurrency: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly seed?: number;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Readonly<{
  rps: number;
  trafficType: string;
  timeoutSeconds: number;
  summaryIntervalSeconds: number;
  summaryMode: SummaryMode;
  concurrency: number;
}> = {
  rps: 1,
  trafficType: 'mixed',
  timeoutSeconds: 5,
  summaryIntervalSeconds: 30,
  summaryMode: 'cumulative',
  concurrency: 1,
};

export const USER_AGENT_PREFIX = 'foodme';

const endpointTableSchema = z.record(z.string(), z.number());

export const trafficConfigSchema = z
  .object({
    target: z.string().min(1),
    rps: z.number().optional(),
    trafficType: z.string().min(1).optional(),
    weights: endpointTableSchema,
    errorRates: endpointTableSchema.optional(),
    timeoutSeconds: z.number().positive().optional(),
    summaryIntervalSeconds: z.number().optional(),
    summaryMode: z.enum(['cumulative', 'windowed']).optional(),
    concurrency: z.number().int().min(1).optional(),
    headers: z.record(z.string(), z.string()).optional(),
    seed: z.number().int().optional(),
  })
  .strict();

/**
 * Expand host:port into a full base URL without trailing slashes
 */
export function normalizeBaseUrl(target: string): string {
  const base =
    target.startsWith('http://') || target.startsWith('https://') ? target : `http://${target}`;
  return base.replace(/\/+$/, '');
}

/**
 * Default headers that callers can override/extend
 */
export function buildDefaultHeaders(
  trafficType: string,
  extra: Record<string, string> = {}
): Record<string, string> {
  return {
    'User-Agent': `${USER_AGENT_PREFIX}-${trafficType}-load`,
    'X-Traffic-Type': trafficType,
    ...extra,
  };
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(input: TrafficConfigInput): TrafficConfig {
  const trafficType = input.trafficType ?? DEFAULT_CONFIG.trafficType;

  return {
    target: input.target,
    baseUrl: normalizeBaseUrl(input.target),
    rps: input.rps ?? DEFAULT_CONFIG.rps,
    trafficType,
    weights: Object.freeze({ ...input.weights }),
    errorRates: Object.freeze({ ...input.errorRates }),
    timeoutSeconds: input.timeoutSeconds ?? DEFAULT_CONFIG.timeoutSeconds,
    summaryIntervalSeconds: input.summaryIntervalSeconds ?? DEFAULT_CONFIG.summaryIntervalSeconds,
    summaryMode: input.summaryMode ?? DEFAULT_CONFIG.summaryMode,
    concurrency: input.concurrency ?? DEFAULT_CONFIG.concurrency,
    headers: Object.freeze(buildDefaultHeaders(trafficType, input.headers)),
    seed: input.seed,
  };
}

/**
 * Validate untyped input (a parsed file, CLI overrides) into a configuration.
 * Unknown endpoint names are thrown rather than returned: they indicate a broken
 * mapping between configuration and catalog.
 */
export function parseTrafficConfig(raw: unknown): Result<TrafficConfig, ConfigurationError> {
  const parsed = trafficConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(
      new ConfigurationError('Invalid traffic configuration', fromZodIssues(parsed.error.issues))
    );
  }

  const input = parsed.data;
  assertKnownEndpoints(input.weights, 'weights');
  assertKnownEndpoints(input.errorRates ?? {}, 'errorRates');

  const config = mergeConfig(input);
  const validation = combineValidationResults(
    validateRate(config.rps),
    validateWeights(input.weights),
    validateErrorRates(input.errorRates ?? {}),
    validateSummaryInterval(config.summaryIntervalSeconds)
  );

  if (!validation.valid) {
    return fail(new ConfigurationError('Invalid traffic configuration', validation.errors));
  }

  return ok(Object.freeze(config));
}

/**
 * Build a configuration, throwing on invalid input
 */
export function createTrafficConfig(input: TrafficConfigInput): TrafficConfig {
  const result = parseTrafficConfig(input);
  if (result.isFailure) {
    throw result.error;
  }
  return result.value;
}
