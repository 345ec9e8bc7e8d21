/**
 * Wall-clock timing around a unit of work.
 */

/**
 * Starts a high-resolution timer. The returned function reports the elapsed
 * time in seconds to `record` and returns it.
 *
 * @example
 * const end = startTimer((seconds) => histogram.observe(seconds));
 * // ... do work ...
 * const duration = end();
 */
export function startTimer(record: (seconds: number) => void): () => number {
  const start = process.hrtime.bigint();

  return () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    record(durationSeconds);
    return durationSeconds;
  };
}

/**
 * Runs `work` and records its duration exactly once, whether it returns or
 * throws. An error from `work` is rethrown after recording.
 *
 * When `work` returns a promise, the duration is recorded as soon as the
 * promise settles, ahead of any continuation the caller attaches, and the
 * same promise is returned.
 */
export function timeWork<T>(work: () => T, record: (seconds: number) => void): T {
  const stop = startTimer(record);

  let result: T;
  try {
    result = work();
  } catch (error) {
    stop();
    throw error;
  }

  if (isPromiseLike(result)) {
    // The derived promise settles either way; the caller observes `result`.
    void Promise.resolve(result).then(stop, stop);
    return result;
  }

  stop();
  return result;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
