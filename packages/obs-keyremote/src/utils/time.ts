export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Resolves with the promise's value, or with `onTimeout()` once `ms` elapses first.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `task` now and then on every interval tick, skipping ticks that
 * arrive while a previous run is still in flight.
 */
export function startNonOverlappingInterval(
  task: () => Promise<void>,
  intervalMs: number,
  onError: (error: unknown) => void,
): () => void {
  let running = false;
  const tick = async () => {
    if (running) {
      return;
    }
    running = true;
    try {
      await task();
    } finally {
      running = false;
    }
  };

  const runTick = () => {
    tick().catch(onError);
  };

  runTick();
  const interval = setInterval(runTick, intervalMs);
  return () => clearInterval(interval);
}
