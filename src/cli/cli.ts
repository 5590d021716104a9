#!/usr/bin/env node
/**
 * foodme-traffic command line
 *
 *   foodme-traffic --preset good --target http://localhost:3000
 *   foodme-traffic --preset chaos --duration 120 --rps 20
 *   foodme-traffic --config traffic.yaml        (SIGHUP re-reads the file)
 */

import { EventEmitter } from 'events';
import { Command, CommanderError, InvalidArgumentError, Option, OutputConfiguration } from 'commander';
import { z } from 'zod';
import { TrafficConfig, parseTrafficConfig } from '../config/config';
import { loadTrafficConfig } from '../config/loader';
import { PRESET_NAMES, TrafficPresets } from '../config/presets';
import { Clock } from '../infra/clock';
import { ConsoleLogger, LOG_LEVELS, LogLevel, Logger, parseLogLevel } from '../infra/observability';
import { installSignalHandlers } from '../infra/signals';
import { ConfigurationError, UnknownEndpointError } from '../infra/validation';
import { TrafficGenerator } from '../orchestration/trafficGenerator';
import { AxiosTransport } from '../transport/axiosTransport';
import { MockTransport } from '../transport/mockTransport';
import { HttpTransport } from '../transport/transport';

const VERSION = '1.0.0';

const cliOptionsSchema = z.object({
  config: z.string().optional(),
  preset: z.enum(['good', 'chaos']).optional(),
  target: z.string().optional(),
  duration: z.number().optional(),
  rps: z.number().optional(),
  summaryInterval: z.number().optional(),
  summaryMode: z.enum(['cumulative', 'windowed']).optional(),
  concurrency: z.number().int().optional(),
  seed: z.number().int().optional(),
  logLevel: z.nativeEnum(LogLevel),
  dryRun: z.boolean(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export interface RunSettings {
  config: TrafficConfig;
  durationSeconds?: number;
  /**
   * Set when the configuration came from a file that can be reloaded
   */
  configPath?: string;
  overrides: Record<string, unknown>;
}

export interface CliDeps {
  transport?: HttpTransport;
  logger?: Logger;
  clock?: Clock;
  signals?: EventEmitter;
  output?: OutputConfiguration;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError(`Allowed choices are ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name('foodme-traffic')
    .description('Synthetic HTTP traffic with weighted endpoints and error injection')
    .version(VERSION)
    .option('-c, --config <path>', 'YAML or JSON traffic configuration')
    .addOption(
      new Option('-p, --preset <name>', 'built-in traffic profile').choices(PRESET_NAMES)
    )
    .option('-t, --target <url>', 'target base URL or host:port')
    .option('-d, --duration <seconds>', 'stop after this many seconds', parseNumber)
    .option('--rps <n>', 'requests per second', parseNumber)
    .option('--summary-interval <seconds>', 'seconds between summaries, 0 disables', parseNumber)
    .addOption(
      new Option('--summary-mode <mode>', 'summary counters').choices(['cumulative', 'windowed'])
    )
    .option('--concurrency <n>', 'maximum cycles in flight', parseInteger)
    .option('--seed <n>', 'seed for reproducible traffic', parseInteger)
    .option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR', parseLevel, LogLevel.INFO)
    .option('--dry-run', 'answer requests in-process instead of sending them', false)
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }
  return program;
}

/**
 * Parse user arguments (without the node and script entries)
 */
export function parseCliOptions(argv: string[], output?: OutputConfiguration): CliOptions {
  const program = createProgram(output);
  program.parse(argv, { from: 'user' });
  return cliOptionsSchema.parse(program.opts());
}

function collectOverrides(options: CliOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (options.target !== undefined) overrides.target = options.target;
  if (options.rps !== undefined) overrides.rps = options.rps;
  if (options.summaryInterval !== undefined) overrides.summaryIntervalSeconds = options.summaryInterval;
  if (options.summaryMode !== undefined) overrides.summaryMode = options.summaryMode;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.seed !== undefined) overrides.seed = options.seed;

  return overrides;
}

/**
 * Turn parsed options into a validated configuration. CLI values win over file and preset values.
 */
export async function resolveRunSettings(options: CliOptions): Promise<RunSettings> {
  if ((options.config === undefined) === (options.preset === undefined)) {
    throw new ConfigurationError('Exactly one of --config or --preset is required');
  }

  const overrides = collectOverrides(options);

  if (options.config !== undefined) {
    const result = await loadTrafficConfig(options.config, overrides);
    if (result.isFailure) {
      throw result.error;
    }
    return {
      config: result.value,
      durationSeconds: options.duration,
      configPath: options.config,
      overrides,
    };
  }

  const preset = TrafficPresets.byName(options.preset ?? 'good');
  const result = parseTrafficConfig({ ...preset.input, ...overrides });
  if (result.isFailure) {
    throw result.error;
  }
  return {
    config: result.value,
    durationSeconds: options.duration ?? preset.defaultDurationSeconds,
    overrides,
  };
}

/**
 * Re-read a config file into a running generator. A bad file keeps the current configuration.
 */
export async function reloadConfig(
  generator: TrafficGenerator,
  path: string,
  overrides: Record<string, unknown>,
  logger: Logger
): Promise<boolean> {
  try {
    const result = await loadTrafficConfig(path, overrides);
    if (result.isFailure) {
      logger.error('Config reload rejected', result.error, { path });
      return false;
    }
    generator.reconfigure(result.value);
    return true;
  } catch (error) {
    logger.error('Config reload rejected', toError(error), { path });
    return false;
  }
}

export async function main(
  argv: string[] = process.argv.slice(2),
  deps: CliDeps = {}
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv, deps.output);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const logger = deps.logger ?? new ConsoleLogger(options.logLevel);

  let settings: RunSettings;
  try {
    settings = await resolveRunSettings(options);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof UnknownEndpointError) {
      logger.error('Invalid configuration', error);
      return 1;
    }
    throw error;
  }

  const transport = deps.transport ?? (options.dryRun ? new MockTransport() : new AxiosTransport());
  const generator = new TrafficGenerator(settings.config, { transport, logger, clock: deps.clock });

  const configPath = settings.configPath;
  const dispose = installSignalHandlers(
    {
      stop: (signal) => {
        logger.info('Signal received', { signal });
        generator.stop();
      },
      reload: configPath
        ? () => {
          void reloadConfig(generator, configPath, settings.overrides, logger);
        }
        : undefined,
    },
    deps.signals
  );

  try {
    await generator.run({ durationSeconds: settings.durationSeconds });
    return 0;
  } catch (error) {
    logger.error('Traffic generation failed', toError(error));
    return 1;
  } finally {
    dispose();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
