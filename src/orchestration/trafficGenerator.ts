/**
 * TRAFFIC GENERATOR (PACING LOOP)
 *
 * Each cycle: pick an endpoint, decide whether to corrupt it, build the request,
 * send it, classify the outcome, record it. Between cycles the loop sleeps for
 * whatever is left of the target interval; a cycle that overruns its interval
 * is followed immediately by the next one, without catching up.
 *
 * Lifecycle (see RunStateMachine): IDLE -> RUNNING -> STOPPING -> STOPPED.
 * On every exit path the transport is closed and exactly one FINAL summary is logged.
 */

import { v4 as uuidv4 } from 'uuid';
import { TrafficConfig } from '../config/config';
import { buildRequest } from '../domain/endpoints';
import { RunState, RunStateMachine } from '../domain/runStateMachine';
import { CycleOutcome, EndpointName, exceptionOutcome } from '../domain/types';
import { Clock, systemClock } from '../infra/clock';
import {
  MetricsAggregator,
  TrafficSummary,
  formatSummary,
} from '../infra/metricsAggregator';
import { ConsoleLogger, LogLevel, Logger } from '../infra/observability';
import { ConfigurationError, UnknownEndpointError, validateDuration } from '../infra/validation';
import { HttpTransport } from '../transport/transport';
import { ErrorInjector, InjectionStats } from './errorInjector';
import { RandomSource, SeededRandom, createRandomSource } from './random';
import { RequestExecutor } from './requestExecutor';
import { WeightedSelector } from './weightedSelector';

export interface TrafficGeneratorDeps {
  transport: HttpTransport;
  logger?: Logger;
  random?: RandomSource;
  clock?: Clock;
}

export interface RunOptions {
  /**
   * Stop after this many seconds; absent means run until stopped
   */
  durationSeconds?: number;

  /**
   * External cancellation, equivalent to calling stop()
   */
  signal?: AbortSignal;
}

/**
 * Everything a cycle reads from configuration, swapped as one reference
 */
interface CyclePlan {
  readonly config: TrafficConfig;
  readonly selector: WeightedSelector;
  readonly injector: ErrorInjector;
  /**
   * Shared by selection, injection and payload building
   */
  readonly random: RandomSource;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeOutcome(outcome: CycleOutcome): string {
  return outcome.kind === 'status' ? String(outcome.statusCode) : outcome.exceptionKind;
}

export class TrafficGenerator {
  private plan: CyclePlan;
  private readonly stateMachine = new RunStateMachine();
  private readonly metrics = new MetricsAggregator();
  private readonly window = new MetricsAggregator();
  private readonly stopController = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();

  private readonly transport: HttpTransport;
  private executor: RequestExecutor;
  private readonly clock: Clock;
  private logger: Logger;

  private startedAt?: number;
  private fatalError?: { error: unknown };

  constructor(config: TrafficConfig, deps: TrafficGeneratorDeps) {
    this.transport = deps.transport;
    this.logger = deps.logger ?? new ConsoleLogger(LogLevel.INFO);
    this.clock = deps.clock ?? systemClock;
    this.executor = new RequestExecutor(this.transport, this.logger);
    this.plan = this.buildPlan(config, deps.random ?? createRandomSource(config.seed));
  }

  /**
   * Swap in a new configuration. Cycles already started finish with the old one.
   * A changed seed restarts the random sequence; injection stats carry over.
   */
  reconfigure(config: TrafficConfig): void {
    const previous = this.plan;
    const random =
      config.seed !== undefined && config.seed !== previous.config.seed
        ? new SeededRandom(config.seed)
        : previous.random;
    this.plan = this.buildPlan(config, random, previous.injector.getStats());
    this.logger.info('Configuration reloaded', {
      rps: config.rps,
      trafficType: config.trafficType,
      weights: config.weights,
      errorRates: config.errorRates,
    });
  }

  /**
   * Request a graceful stop. The cycle in flight finishes and is recorded.
   * Does nothing unless a run is in progress.
   */
  stop(): void {
    if (this.stateMachine.is(RunState.RUNNING)) {
      this.stateMachine.transition(RunState.STOPPING);
      this.logger.info('Stop requested', { inFlight: this.inFlight.size });
    }
    if (this.stateMachine.is(RunState.STOPPING)) {
      this.stopController.abort();
    }
  }

  async run(options: RunOptions = {}): Promise<TrafficSummary> {
    const validation = validateDuration(options.durationSeconds);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid run options', validation.errors);
    }

    this.stateMachine.transition(RunState.RUNNING);

    const config = this.plan.config;
    this.logger = this.logger.child({ runId: uuidv4(), trafficType: config.trafficType });
    this.executor = new RequestExecutor(this.transport, this.logger);
    const timer = this.logger.startTimer('traffic_run');
    this.startedAt = this.clock.now();

    const onAbort = (): void => this.stop();
    if (options.signal?.aborted) {
      this.stop();
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await this.transport.open();
      this.logger.info('Traffic generation started', {
        target: config.baseUrl,
        rps: config.rps,
        concurrency: config.concurrency,
        durationSeconds: options.durationSeconds,
        summaryIntervalSeconds: config.summaryIntervalSeconds,
        summaryMode: config.summaryMode,
        transport: this.transport.name,
      });
      await this.loop(options.durationSeconds);
    } catch (error) {
      this.fatalError = { error };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    const summary = await this.finish();
    timer.end({ totalCycles: summary.totalCycles });

    if (this.fatalError) {
      this.logger.error('Traffic generation aborted', toError(this.fatalError.error));
      throw this.fatalError.error;
    }
    return summary;
  }

  getState(): RunState {
    return this.stateMachine.state;
  }

  /**
   * Cumulative snapshot of the run so far
   */
  getMetrics(): TrafficSummary {
    return this.metrics.summarize(this.elapsedSeconds());
  }

  getInjectionStats(): InjectionStats {
    return this.plan.injector.getStats();
  }

  getConfig(): TrafficConfig {
    return this.plan.config;
  }

  // ============================================================================
  // LOOP
  // ============================================================================

  private get stopRequested(): boolean {
    return this.stopController.signal.aborted || this.fatalError !== undefined;
  }

  private async loop(durationSeconds: number | undefined): Promise<void> {
    const startedAt = this.clock.now();
    const durationMs = durationSeconds === undefined ? undefined : durationSeconds * 1000;
    let nextSummaryAt = startedAt + this.plan.config.summaryIntervalSeconds * 1000;
    let windowStartedAt = startedAt;

    while (!this.stopRequested) {
      const { config } = this.plan;

      if (this.inFlight.size >= config.concurrency) {
        await Promise.race(this.inFlight);
        continue;
      }

      const cycleStartedAt = this.clock.now();
      if (config.concurrency > 1) {
        this.launch();
      } else {
        await this.runCycle();
      }

      const now = this.clock.now();
      if (durationMs !== undefined && now - startedAt >= durationMs) {
        this.logger.info('Run duration reached', { durationSeconds });
        break;
      }

      const intervalSeconds = this.plan.config.summaryIntervalSeconds;
      if (intervalSeconds > 0 && now >= nextSummaryAt) {
        this.emitPeriodicSummary(now, windowStartedAt);
        windowStartedAt = now;
        nextSummaryAt = now + intervalSeconds * 1000;
      }

      const remainingMs = 1000 / this.plan.config.rps - (now - cycleStartedAt);
      if (remainingMs > 0) {
        await this.clock.sleep(remainingMs, this.stopController.signal);
      }
    }

    await Promise.all(this.inFlight);
  }

  private launch(): void {
    const cycle: Promise<void> = this.runCycle()
      .catch((error: unknown) => {
        if (!this.fatalError) {
          this.fatalError = { error };
        }
        this.stop();
      })
      .finally(() => {
        this.inFlight.delete(cycle);
      });
    this.inFlight.add(cycle);
  }

  private async runCycle(): Promise<void> {
    const plan = this.plan;
    const endpoint: EndpointName = plan.selector.choose();
    const injected = plan.injector.shouldInject(endpoint);

    let outcome: CycleOutcome;
    try {
      const request = buildRequest(endpoint, injected, {
        baseUrl: plan.config.baseUrl,
        headers: plan.config.headers,
        random: plan.random,
      });
      outcome = await this.executor.send(request, plan.config.timeoutSeconds * 1000);
    } catch (error) {
      if (error instanceof UnknownEndpointError) {
        throw error;
      }
      this.logger.error('Cycle failed', toError(error), { endpoint, injected });
      outcome = exceptionOutcome('unexpected');
    }

    this.metrics.record(outcome, endpoint, injected);
    if (plan.config.summaryMode === 'windowed') {
      this.window.record(outcome, endpoint, injected);
    }

    this.logger.debug('Cycle completed', {
      endpoint,
      injected,
      outcome: describeOutcome(outcome),
    });
  }

  // ============================================================================
  // SUMMARIES AND SHUTDOWN
  // ============================================================================

  private emitPeriodicSummary(now: number, windowStartedAt: number): void {
    const summary =
      this.plan.config.summaryMode === 'windowed'
        ? this.window.summarize((now - windowStartedAt) / 1000)
        : this.metrics.summarize(this.elapsedSeconds());

    this.logger.info(formatSummary(summary), { summary });
    this.window.reset();
  }

  private async finish(): Promise<TrafficSummary> {
    if (this.stateMachine.is(RunState.RUNNING)) {
      this.stateMachine.transition(RunState.STOPPING);
    }

    await Promise.allSettled(this.inFlight);

    try {
      await this.transport.close();
    } catch (error) {
      this.logger.error('Failed to close transport', toError(error), {
        transport: this.transport.name,
      });
    }

    const summary = this.metrics.summarize(this.elapsedSeconds());
    this.logger.info(formatSummary(summary, true), { summary });

    this.stateMachine.transition(RunState.STOPPED);
    return summary;
  }

  private elapsedSeconds(): number {
    return this.startedAt === undefined ? 0 : (this.clock.now() - this.startedAt) / 1000;
  }

  private buildPlan(config: TrafficConfig, random: RandomSource, stats?: InjectionStats): CyclePlan {
    return {
      config,
      selector: new WeightedSelector(config.weights, random),
      injector: new ErrorInjector(config.errorRates, random, stats),
      random,
    };
  }
}
