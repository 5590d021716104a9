/**
 * foodme-traffic - synthetic HTTP traffic generator
 * Main entry point
 */

import { TrafficConfigInput, createTrafficConfig } from './config/config';
import { Clock } from './infra/clock';
import { ConsoleLogger, LogLevel, Logger } from './infra/observability';
import { RandomSource } from './orchestration/random';
import { TrafficGenerator } from './orchestration/trafficGenerator';
import { AxiosTransport } from './transport/axiosTransport';
import { MockTransport } from './transport/mockTransport';
import { HttpTransport } from './transport/transport';

export interface CreateTrafficGeneratorOptions {
  transport?: HttpTransport;
  logger?: Logger;
  logLevel?: LogLevel;
  clock?: Clock;
  random?: RandomSource;
  /**
   * Answer requests in-process instead of sending them
   */
  dryRun?: boolean;
}

/**
 * Validate the configuration and wire a generator with the default transport and logger
 */
export function createTrafficGenerator(
  input: TrafficConfigInput,
  options: CreateTrafficGeneratorOptions = {}
): TrafficGenerator {
  const config = createTrafficConfig(input);
  const transport =
    options.transport ?? (options.dryRun ? new MockTransport() : new AxiosTransport());

  return new TrafficGenerator(config, {
    transport,
    logger: options.logger ?? new ConsoleLogger(options.logLevel ?? LogLevel.INFO),
    clock: options.clock,
    random: options.random,
  });
}

export * from './domain/types';
export * from './domain/endpoints';
export * from './domain/orderPayloads';
export * from './domain/runStateMachine';
export * from './config/config';
export * from './config/loader';
export * from './config/presets';
export * from './infra/clock';
export * from './infra/metricsAggregator';
export * from './infra/observability';
export * from './infra/signals';
export * from './infra/validation';
export * from './orchestration/random';
export * from './orchestration/weightedSelector';
export * from './orchestration/errorInjector';
export * from './orchestration/requestExecutor';
export * from './orchestration/trafficGenerator';
export * from './transport/transport';
export * from './transport/axiosTransport';
export * from './transport/mockTransport';
