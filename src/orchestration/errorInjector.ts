/**
 * ERROR INJECTION
 *
 * Decides, once per cycle, whether the chosen endpoint should be sent in its
 * malformed form. Each decision is an independent Bernoulli draw with the
 * endpoint's configured probability (0 when absent).
 *
 * USAGE:
 * ======
 * const injector = new ErrorInjector({ post_order: 0.5, bogus: 1 }, random);
 * const inject = injector.shouldInject('post_order');
 */

import { RandomSource } from './random';
import { EndpointName, EndpointTable } from '../domain/types';
import { ConfigurationError, validateErrorRates } from '../infra/validation';

export interface InjectionStats {
  decisions: number;
  injectionCount: number;
  byEndpoint: Partial<Record<EndpointName, number>>;
}

export class ErrorInjector {
  private decisions = 0;
  private injectionCount = 0;
  private byEndpoint: Partial<Record<EndpointName, number>> = {};

  /**
   * @param carried - counters to continue from, when an injector replaces another
   */
  constructor(
    private readonly errorRates: EndpointTable,
    private readonly random: RandomSource,
    carried?: InjectionStats
  ) {
    const table: Record<string, number> = {};
    for (const [name, rate] of Object.entries<number | undefined>(errorRates)) {
      if (rate !== undefined) {
        table[name] = rate;
      }
    }

    const validation = validateErrorRates(table);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid error rates', validation.errors);
    }

    if (carried) {
      this.decisions = carried.decisions;
      this.injectionCount = carried.injectionCount;
      this.byEndpoint = { ...carried.byEndpoint };
    }
  }

  errorProbability(endpoint: EndpointName): number {
    return this.errorRates[endpoint] ?? 0;
  }

  shouldInject(endpoint: EndpointName): boolean {
    this.decisions++;

    const probability = this.errorProbability(endpoint);
    const inject = probability > 0 && this.random.next() < probability;

    if (inject) {
      this.injectionCount++;
      this.byEndpoint[endpoint] = (this.byEndpoint[endpoint] ?? 0) + 1;
    }
    return inject;
  }

  /**
   * Get injection stats
   */
  getStats(): InjectionStats {
    return {
      decisions: this.decisions,
      injectionCount: this.injectionCount,
      byEndpoint: { ...this.byEndpoint },
    };
  }

  /**
   * Reset injection state
   */
  reset(): void {
    this.decisions = 0;
    this.injectionCount = 0;
    this.byEndpoint = {};
  }
}
