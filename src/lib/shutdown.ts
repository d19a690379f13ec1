/**
 * Process shutdown signals, behind an interface so tests can raise them
 */

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface ShutdownSignals {
  /**
   * Call `listener` on the first shutdown signal
   *
   * @returns Function that removes the subscription
   */
  subscribe(listener: (signal: NodeJS.Signals) => void): () => void;
}

/**
 * Listens on the real process. Handlers are one-shot, so a second Ctrl+C falls
 * back to Node's default behaviour and terminates immediately.
 */
export const processShutdownSignals: ShutdownSignals = {
  subscribe(listener) {
    const handlers = SHUTDOWN_SIGNALS.map((signal) => {
      const handler = (): void => listener(signal);
      process.once(signal, handler);
      return { signal, handler };
    });

    return () => {
      for (const { signal, handler } of handlers) {
        process.removeListener(signal, handler);
      }
    };
  },
};
