export type Sleep = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Delay before the attempt that follows `attempt` (1-based): base, 2×base,
 * 4×base, ... never above `maxMs`.
 */
export const backoffDelayMs = (attempt: number, baseMs: number, maxMs: number): number => {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
};

export const elapsedSeconds = (startedAtMs: number, nowMs: number = Date.now()): number =>
  Math.max(0, (nowMs - startedAtMs) / 1000);
