/**
 * RUN LIFECYCLE STATE MACHINE
 *
 * States: S = {IDLE, RUNNING, STOPPING, STOPPED}
 * Initial State: IDLE
 * Terminal State: STOPPED
 *
 *   IDLE ──run()──▶ RUNNING ──stop / duration──▶ STOPPING ──released──▶ STOPPED
 *
 * A generator instance runs at most once; STOPPED has no outgoing transitions.
 */

export enum RunState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  STOPPED = 'STOPPED',
}

const VALID_TRANSITIONS: ReadonlyMap<RunState, ReadonlySet<RunState>> = new Map([
  [RunState.IDLE, new Set([RunState.RUNNING])],
  [RunState.RUNNING, new Set([RunState.STOPPING])],
  [RunState.STOPPING, new Set([RunState.STOPPED])],
  [RunState.STOPPED, new Set<RunState>()],
]);

export class InvalidRunStateTransitionError extends Error {
  constructor(
    public readonly from: RunState,
    public readonly to: RunState
  ) {
    super(`Invalid run state transition from ${from} to ${to}`);
    this.name = 'InvalidRunStateTransitionError';
    Object.setPrototypeOf(this, InvalidRunStateTransitionError.prototype);
  }
}

export class RunStateMachine {
  private current: RunState = RunState.IDLE;
  private readonly history: Array<{ state: RunState; at: Date }> = [
    { state: RunState.IDLE, at: new Date() },
  ];

  static isValidTransition(from: RunState, to: RunState): boolean {
    return VALID_TRANSITIONS.get(from)?.has(to) ?? false;
  }

  static isTerminalState(state: RunState): boolean {
    return VALID_TRANSITIONS.get(state)?.size === 0;
  }

  get state(): RunState {
    return this.current;
  }

  /**
   * Move to the next state, throwing on an illegal transition
   */
  transition(to: RunState): void {
    if (!RunStateMachine.isValidTransition(this.current, to)) {
      throw new InvalidRunStateTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push({ state: to, at: new Date() });
  }

  is(state: RunState): boolean {
    return this.current === state;
  }

  getHistory(): ReadonlyArray<{ state: RunState; at: Date }> {
    return [...this.history];
  }
}
