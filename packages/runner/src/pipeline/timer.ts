/**
 * Timing for one pipeline run.
 */
export function createTimer(now: () => number = Date.now) {
  const startMs = now();

  return {
    getDurationMs(): number {
      return now() - startMs;
    },
  };
}
