import { EventEmitter } from 'events';

export interface SignalHandlers {
  /**
   * SIGINT / SIGTERM
   */
  stop: (signal: NodeJS.Signals) => void;

  /**
   * SIGHUP
   */
  reload?: () => void;
}

const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Translate process signals into generator calls.
 * Returns a disposer that removes every listener it added.
 */
export function installSignalHandlers(
  handlers: SignalHandlers,
  emitter: EventEmitter = process
): () => void {
  const listeners: Array<[NodeJS.Signals, () => void]> = STOP_SIGNALS.map((signal) => [
    signal,
    () => handlers.stop(signal),
  ]);

  const reload = handlers.reload;
  if (reload) {
    listeners.push(['SIGHUP', () => reload()]);
  }

  for (const [signal, listener] of listeners) {
    emitter.on(signal, listener);
  }

  return () => {
    for (const [signal, listener] of listeners) {
      emitter.removeListener(signal, listener);
    }
  };
}
