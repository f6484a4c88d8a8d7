/**
 * Resolves after `ms`, or as soon as any of the given signals aborts.
 * Never rejects: callers check their own signal after waking.
 */
export function sleep(ms: number, ...signals: Array<AbortSignal | undefined>): Promise<void> {
  const active = signals.filter((signal): signal is AbortSignal => signal !== undefined);

  return new Promise((resolve) => {
    if (active.some((signal) => signal.aborted)) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      for (const signal of active) {
        signal.removeEventListener("abort", finish);
      }
      resolve();
    };

    const timer = setTimeout(finish, Math.max(0, ms));
    for (const signal of active) {
      signal.addEventListener("abort", finish, { once: true });
    }
  });
}
