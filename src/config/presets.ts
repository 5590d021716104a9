import { TrafficConfigInput } from './config';

export const DEFAULT_TARGET = 'http://localhost:3000';

export type PresetName = 'good' | 'chaos';

export const PRESET_NAMES: readonly PresetName[] = ['good', 'chaos'];

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value);
}

export interface TrafficPreset {
  input: TrafficConfigInput;
  /**
   * Run length when the caller gives none; absent means run until stopped
   */
  defaultDurationSeconds?: number;
}

/**
 * Ready-made traffic profiles
 */
export class TrafficPresets {
  /**
   * Healthy baseline: realistic browsing and ordering, no injected errors
   */
  static good(target: string = DEFAULT_TARGET): TrafficPreset {
    return {
      input: {
        target,
        rps: 3,
        trafficType: 'good',
        weights: {
          get_root: 10,
          get_list: 40,
          get_one: 30,
          post_order: 20,
          bogus: 0,
        },
        errorRates: {},
        summaryIntervalSeconds: 60,
      },
    };
  }

  /**
   * Error-heavy traffic to trip 4xx and latency alerts
   */
  static chaos(target: string = DEFAULT_TARGET): TrafficPreset {
    return {
      input: {
        target,
        rps: 15,
        trafficType: 'chaos',
        weights: {
          get_root: 5,
          get_list: 15,
          get_one: 20,
          post_order: 40,
          bogus: 20,
        },
        errorRates: {
          post_order: 0.5, // half of all orders malformed
          get_one: 0.3,
          bogus: 1.0,
        },
        summaryIntervalSeconds: 30,
      },
      defaultDurationSeconds: 300,
    };
  }

  static byName(name: PresetName, target?: string): TrafficPreset {
    return name === 'good' ? TrafficPresets.good(target) : TrafficPresets.chaos(target);
  }
}
