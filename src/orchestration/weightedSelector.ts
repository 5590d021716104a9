import { RandomSource } from './random';
import { ENDPOINT_NAMES, EndpointName, EndpointTable } from '../domain/types';
import { ConfigurationError, validateWeights } from '../infra/validation';

interface WeightedEntry {
  name: EndpointName;
  weight: number;
  cumulative: number;
}

/**
 * Weighted random draw with replacement.
 *
 * P(name) = weight(name) / sum(weights). Each call is an independent draw; there
 * is no memory between calls. Zero-weight entries are never returned.
 */
export class WeightedSelector {
  private readonly entries: readonly WeightedEntry[];
  private readonly total: number;

  constructor(
    weights: EndpointTable,
    private readonly random: RandomSource
  ) {
    const table: Record<string, number> = {};
    for (const [name, weight] of Object.entries<number | undefined>(weights)) {
      if (weight !== undefined) {
        table[name] = weight;
      }
    }

    const validation = validateWeights(table);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid endpoint weights', validation.errors);
    }

    const entries: WeightedEntry[] = [];
    let cumulative = 0;
    for (const name of ENDPOINT_NAMES) {
      const weight = weights[name] ?? 0;
      if (weight > 0) {
        cumulative += weight;
        entries.push({ name, weight, cumulative });
      }
    }

    this.entries = entries;
    this.total = cumulative;
  }

  choose(): EndpointName {
    const target = this.random.next() * this.total;
    for (const entry of this.entries) {
      if (target < entry.cumulative) {
        return entry.name;
      }
    }
    // target rounded up to the total
    return this.entries[this.entries.length - 1].name;
  }

  probability(name: EndpointName): number {
    const entry = this.entries.find((e) => e.name === name);
    return entry ? entry.weight / this.total : 0;
  }

  getCandidates(): EndpointName[] {
    return this.entries.map((e) => e.name);
  }
}
