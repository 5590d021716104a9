import { TrafficConfigInput, createTrafficConfig } from '../../src/config/config';
import { RandomSource, SeededRandom } from '../../src/orchestration/random';
import { TrafficGenerator } from '../../src/orchestration/trafficGenerator';
import { TransportRequest } from '../../src/transport/transport';
import { ManualClock } from './manualClock';
import { RecordingLogger } from './recordingLogger';
import { ScriptedTransport, ScriptedTransportOptions } from './scriptedTransport';

export type HarnessHandler = (
  request: TransportRequest,
  index: number,
  harness: GeneratorHarness
) => number | Promise<number>;

const BASE_INPUT: TrafficConfigInput = {
  target: 'http://api.test',
  rps: 4,
  weights: { get_root: 1 },
  summaryIntervalSeconds: 0,
};

/**
 * A generator wired to a manual clock, a recording logger and a scripted transport
 */
export class GeneratorHarness {
  readonly clock = new ManualClock();
  readonly logger = new RecordingLogger();
  readonly transport: ScriptedTransport;
  readonly generator: TrafficGenerator;

  constructor(
    input: Partial<TrafficConfigInput> = {},
    handler: HarnessHandler = () => 200,
    options: ScriptedTransportOptions = {},
    random: RandomSource = new SeededRandom(1)
  ) {
    this.transport = new ScriptedTransport((request, index) => handler(request, index, this), options);
    this.generator = new TrafficGenerator(createTrafficConfig({ ...BASE_INPUT, ...input }), {
      transport: this.transport,
      logger: this.logger,
      clock: this.clock,
      random,
    });
  }

  summaryLines(): string[] {
    return this.logger.startingWith('SUMMARY').map((e) => e.message);
  }

  finalLines(): string[] {
    return this.logger.startingWith('FINAL').map((e) => e.message);
  }
}
