export type ShutdownSignal = "SIGINT" | "SIGTERM" | "SIGHUP";

const SHUTDOWN_SIGNALS: ShutdownSignal[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/** Conventional exit status for a process ended by `signal`. */
export function exitCodeFor(signal: ShutdownSignal): number {
  return signal === "SIGINT" ? 130 : 0;
}

/**
 * Install one-shot handlers for the shutdown signals. `handler` runs for the
 * first signal only; the returned function removes the handlers.
 */
export function onShutdownSignal(handler: (signal: ShutdownSignal) => void): () => void {
  let fired = false;
  const listeners = SHUTDOWN_SIGNALS.map((signal) => {
    const listener = () => {
      if (fired) return;
      fired = true;
      handler(signal);
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.removeListener(signal, listener);
    }
  };
}
