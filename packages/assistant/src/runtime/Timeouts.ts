/**
 * Runs `task` with an abort signal and rejects with `onTimeout()` once
 * `timeoutMs` elapses. The signal is aborted on timeout so cooperative work
 * (fetch, provider calls) stops instead of finishing in the background.
 */
export const runWithTimeout = async <T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error,
): Promise<T> => {
  const controller = new AbortController();
  if (!timeoutMs || timeoutMs <= 0) {
    return task(controller.signal);
  }
  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
};
