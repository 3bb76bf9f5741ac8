import { TimeoutError } from '../types/errors.js';

/**
 * Runs `fn` with a time budget. When the budget is exceeded, the signal handed
 * to `fn` is aborted and the returned promise rejects with a TimeoutError;
 * whatever `fn` resolves to later is ignored.
 *
 * A budget of 0 or less, or an infinite one, disables the timeout.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  step?: string
): Promise<T> {
  const controller = new AbortController();

  if (timeoutMs === undefined || timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    return fn(controller.signal);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError({
        message: `${step ? `Step "${step}"` : 'Operation'} timed out after ${timeoutMs}ms`,
        step,
        timeoutMs,
      });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    // Always clear the timeout so no timer outlives the call
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}
