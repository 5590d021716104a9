/**
 * Unit Tests: Metrics Aggregator
 */

import { MetricsAggregator, formatSummary } from '../../src/infra/metricsAggregator';
import { exceptionOutcome, statusOutcome } from '../../src/domain/types';

function repeat(times: number, fn: () => void): void {
  for (let i = 0; i < times; i++) fn();
}

describe('MetricsAggregator', () => {
  describe('record and summarize', () => {
    it('should count each outcome once', () => {
      const metrics = new MetricsAggregator();
      repeat(3, () => metrics.record(statusOutcome(200), 'get_list'));
      repeat(2, () => metrics.record(statusOutcome(404), 'bogus', true));
      metrics.record(exceptionOutcome('timeout'), 'post_order');
      metrics.record(statusOutcome(500), 'post_order', true);

      expect(metrics.summarize(10)).toEqual({
        elapsedSeconds: 10,
        totalCycles: 7,
        successCount: 3,
        nonSuccessCount: 4,
        exceptionCount: 1,
        injectedCount: 3,
        throughput: 0.7,
        topStatusCodes: [
          { status: '200', count: 3 },
          { status: '404', count: 2 },
          { status: '500', count: 1 },
        ],
        topExceptions: [{ kind: 'timeout', count: 1 }],
        endpoints: { get_list: 3, bogus: 2, post_order: 2 },
      });
    });

    it('should treat only 200-299 as success', () => {
      const metrics = new MetricsAggregator();
      [199, 200, 201, 299, 300, 404].forEach((status) => metrics.record(statusOutcome(status), 'get_root'));

      const summary = metrics.summarize(1);
      expect(summary.successCount).toBe(3);
      expect(summary.nonSuccessCount).toBe(3);
    });

    it('should keep the top five status codes, ties in first-seen order', () => {
      const metrics = new MetricsAggregator();
      [200, 201, 202, 203, 204, 205].forEach((status) => metrics.record(statusOutcome(status), 'get_root'));
      repeat(2, () => metrics.record(statusOutcome(404), 'bogus'));

      expect(metrics.summarize(1).topStatusCodes).toEqual([
        { status: '404', count: 2 },
        { status: '200', count: 1 },
        { status: '201', count: 1 },
        { status: '202', count: 1 },
        { status: '203', count: 1 },
      ]);
    });

    it('should keep the top three exception kinds', () => {
      const metrics = new MetricsAggregator();
      repeat(3, () => metrics.record(exceptionOutcome('connection_refused'), 'get_root'));
      metrics.record(exceptionOutcome('timeout'), 'get_root');
      repeat(2, () => metrics.record(exceptionOutcome('unexpected'), 'get_root'));
      metrics.record(exceptionOutcome('dns_failure'), 'get_root');

      const summary = metrics.summarize(1);
      expect(summary.exceptionCount).toBe(7);
      expect(summary.topExceptions).toEqual([
        { kind: 'connection_refused', count: 3 },
        { kind: 'unexpected', count: 2 },
        { kind: 'timeout', count: 1 },
      ]);
    });

    it('should honor custom top-N limits', () => {
      const metrics = new MetricsAggregator({ topStatusCodes: 1, topExceptions: 0 });
      metrics.record(statusOutcome(200), 'get_root');
      metrics.record(exceptionOutcome('timeout'), 'get_root');

      const summary = metrics.summarize(1);
      expect(summary.topStatusCodes).toEqual([{ status: '200', count: 1 }]);
      expect(summary.topExceptions).toEqual([]);
    });

    it('should return identical snapshots when nothing was recorded in between', () => {
      const metrics = new MetricsAggregator();
      metrics.record(statusOutcome(201), 'post_order');
      metrics.record(exceptionOutcome('timeout'), 'get_one');

      expect(metrics.summarize(5)).toEqual(metrics.summarize(5));
      expect(metrics.total).toBe(2);
    });

    it('should report zero throughput before any time has passed', () => {
      const metrics = new MetricsAggregator();
      metrics.record(statusOutcome(200), 'get_root');

      expect(metrics.summarize(0).throughput).toBe(0);
    });

    it('should clear everything on reset', () => {
      const metrics = new MetricsAggregator();
      metrics.record(statusOutcome(200), 'get_root', true);
      metrics.reset();

      expect(metrics.summarize(1)).toEqual({
        elapsedSeconds: 1,
        totalCycles: 0,
        successCount: 0,
        nonSuccessCount: 0,
        exceptionCount: 0,
        injectedCount: 0,
        throughput: 0,
        topStatusCodes: [],
        topExceptions: [],
        endpoints: {},
      });
    });
  });

  describe('formatSummary', () => {
    function sample(): MetricsAggregator {
      const metrics = new MetricsAggregator();
      repeat(30, () => metrics.record(statusOutcome(200), 'get_list'));
      repeat(5, () => metrics.record(statusOutcome(404), 'bogus'));
      repeat(2, () => metrics.record(exceptionOutcome('timeout'), 'post_order'));
      return metrics;
    }

    it('should render a periodic summary line', () => {
      expect(formatSummary(sample().summarize(12.5))).toBe(
        'SUMMARY 12.5s total=37 | 2xx=30 | non2xx=7 | errors=2 | rps=2.96 | status_breakdown=[200:30, 404:5] | errors=[timeout:2] | endpoints=[get_list:30, post_order:2, bogus:5]'
      );
    });

    it('should render the final summary line', () => {
      expect(formatSummary(sample().summarize(12.5), true)).toBe(
        'FINAL 12.5s total=37 | 2xx=30 | non2xx=7 | errors=2 | rps=2.96 | status_breakdown=[200:30, 404:5] | errors=[timeout:2] | endpoints=[get_list:30, post_order:2, bogus:5]'
      );
    });

    it('should render an empty run', () => {
      expect(formatSummary(new MetricsAggregator().summarize(0))).toBe(
        'SUMMARY 0.0s total=0 | 2xx=0 | non2xx=0 | errors=0 | rps=0.00 | status_breakdown=[] | errors=[] | endpoints=[]'
      );
    });
  });
});
