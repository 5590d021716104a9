import {
  CycleOutcome,
  ENDPOINT_NAMES,
  EndpointName,
  ExceptionKind,
  isSuccessStatus,
} from '../domain/types';

/**
 * METRICS AGGREGATION
 *
 * Counts every recorded cycle under exactly one status code or exception kind,
 * plus its endpoint. Counters only grow until reset(); summaries are snapshots
 * and never touch the counters.
 */

export interface StatusCount {
  status: string;
  count: number;
}

export interface ExceptionCount {
  kind: ExceptionKind;
  count: number;
}

export interface TrafficSummary {
  elapsedSeconds: number;
  totalCycles: number;
  successCount: number;
  /**
   * Everything outside 2xx, exceptions included
   */
  nonSuccessCount: number;
  exceptionCount: number;
  injectedCount: number;
  /**
   * Cycles per second over the elapsed time
   */
  throughput: number;
  topStatusCodes: StatusCount[];
  topExceptions: ExceptionCount[];
  endpoints: Partial<Record<EndpointName, number>>;
}

export interface MetricsAggregatorOptions {
  topStatusCodes?: number;
  topExceptions?: number;
}

export class MetricsAggregator {
  private statusCounts: Map<string, number> = new Map();
  private exceptionCounts: Map<ExceptionKind, number> = new Map();
  private endpointCounts: Map<EndpointName, number> = new Map();
  private totalCycles = 0;
  private successCount = 0;
  private injectedCount = 0;

  private readonly topStatusCodes: number;
  private readonly topExceptions: number;

  constructor(options: MetricsAggregatorOptions = {}) {
    this.topStatusCodes = options.topStatusCodes ?? 5;
    this.topExceptions = options.topExceptions ?? 3;
  }

  record(outcome: CycleOutcome, endpoint: EndpointName, injected = false): void {
    if (outcome.kind === 'status') {
      increment(this.statusCounts, String(outcome.statusCode));
      if (isSuccessStatus(outcome.statusCode)) {
        this.successCount++;
      }
    } else {
      increment(this.exceptionCounts, outcome.exceptionKind);
    }

    increment(this.endpointCounts, endpoint);
    if (injected) {
      this.injectedCount++;
    }
    this.totalCycles++;
  }

  summarize(elapsedSeconds: number): TrafficSummary {
    let exceptionCount = 0;
    this.exceptionCounts.forEach((count) => {
      exceptionCount += count;
    });

    return {
      elapsedSeconds,
      totalCycles: this.totalCycles,
      successCount: this.successCount,
      nonSuccessCount: this.totalCycles - this.successCount,
      exceptionCount,
      injectedCount: this.injectedCount,
      throughput: elapsedSeconds > 0 ? this.totalCycles / elapsedSeconds : 0,
      topStatusCodes: topEntries(this.statusCounts, this.topStatusCodes).map(([status, count]) => ({
        status,
        count,
      })),
      topExceptions: topEntries(this.exceptionCounts, this.topExceptions).map(([kind, count]) => ({
        kind,
        count,
      })),
      endpoints: Object.fromEntries(this.endpointCounts),
    };
  }

  get total(): number {
    return this.totalCycles;
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.statusCounts.clear();
    this.exceptionCounts.clear();
    this.endpointCounts.clear();
    this.totalCycles = 0;
    this.successCount = 0;
    this.injectedCount = 0;
  }
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Ties keep first-seen order (Array.prototype.sort is stable)
function topEntries<K>(counts: Map<K, number>, limit: number): Array<[K, number]> {
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

/**
 * One-line rendering of a summary:
 * SUMMARY 12.5s total=37 | 2xx=30 | non2xx=7 | errors=2 | rps=2.96 | status_breakdown=[200:30, 404:5] | errors=[timeout:2] | endpoints=[get_list:30, post_order:2, bogus:5]
 *
 * Endpoints are listed in catalog order.
 */
export function formatSummary(summary: TrafficSummary, final = false): string {
  const statuses = summary.topStatusCodes.map((s) => `${s.status}:${s.count}`).join(', ');
  const exceptions = summary.topExceptions.map((e) => `${e.kind}:${e.count}`).join(', ');
  const endpoints = ENDPOINT_NAMES.flatMap((name) => {
    const count = summary.endpoints[name];
    return count === undefined ? [] : [`${name}:${count}`];
  }).join(', ');

  return [
    `${final ? 'FINAL' : 'SUMMARY'} ${summary.elapsedSeconds.toFixed(1)}s total=${summary.totalCycles}`,
    `2xx=${summary.successCount}`,
    `non2xx=${summary.nonSuccessCount}`,
    `errors=${summary.exceptionCount}`,
    `rps=${summary.throughput.toFixed(2)}`,
    `status_breakdown=[${statuses}]`,
    `errors=[${exceptions}]`,
    `endpoints=[${endpoints}]`,
  ].join(' | ');
}
