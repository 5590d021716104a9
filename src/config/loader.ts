import { readFile } from 'fs/promises';
import { extname } from 'path';
import yaml from 'js-yaml';
import { Result } from '../domain/types';
import { ConfigurationError, ValidationError } from '../infra/validation';
import { TrafficConfig, parseTrafficConfig } from './config';

/**
 * Config file loading (YAML or JSON).
 *
 * Files may use the camelCase field names of TrafficConfigInput or the
 * snake_case spelling of older config files; camelCase wins when both appear.
 */

export type ConfigFormat = 'yaml' | 'json';

const KEY_ALIASES: Readonly<Record<string, string>> = {
  traffic_type: 'trafficType',
  error_rates: 'errorRates',
  timeout: 'timeoutSeconds',
  timeout_seconds: 'timeoutSeconds',
  summary_interval: 'summaryIntervalSeconds',
  summary_interval_seconds: 'summaryIntervalSeconds',
  summary_mode: 'summaryMode',
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeConfigKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    const alias = KEY_ALIASES[key];
    if (alias === undefined) {
      normalized[key] = value;
    } else if (!(alias in raw)) {
      normalized[alias] = value;
    }
  }
  return normalized;
}

export function formatFromPath(path: string): ConfigFormat {
  switch (extname(path).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    default:
      throw new ConfigurationError(`Unsupported config file type: ${path}`, [
        new ValidationError('Expected a .yaml, .yml or .json file', 'path', path),
      ]);
  }
}

/**
 * Parse config text into a plain record. An empty document is {}.
 */
export function parseConfigText(
  text: string,
  format: ConfigFormat,
  source = '(inline)'
): Record<string, unknown> {
  if (!text.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = format === 'yaml' ? yaml.load(text) : JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse config file ${source}`, [
      new ValidationError(e instanceof Error ? e.message : String(e), '(file)', source),
    ]);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Failed to parse config file ${source}`, [
      new ValidationError('Top level must be a mapping', '(root)', parsed),
    ]);
  }
  return normalizeConfigKeys(parsed);
}

export async function loadConfigFile(path: string): Promise<Record<string, unknown>> {
  const format = formatFromPath(path);

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    throw new ConfigurationError(`Cannot read config file ${path}`, [
      new ValidationError(e instanceof Error ? e.message : String(e), 'path', path),
    ]);
  }

  return parseConfigText(text, format, path);
}

/**
 * Load, merge overrides over the file contents, and validate
 */
export async function loadTrafficConfig(
  path: string,
  overrides: Record<string, unknown> = {}
): Promise<Result<TrafficConfig, ConfigurationError>> {
  const fromFile = await loadConfigFile(path);
  return parseTrafficConfig({ ...fromFile, ...overrides });
}
