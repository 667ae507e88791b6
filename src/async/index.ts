/**
 * Async Helpers
 *
 * Timers shared by the fetch, LLM and orchestration stages. Every timer is
 * cleared on settle so a finished run leaves nothing scheduled.
 */

/**
 * Raised by withTimeout when the wrapped work does not settle in time
 */
export class TimeoutError extends Error {
  constructor(
    readonly tag: string,
    readonly timeoutMs: number
  ) {
    super(`${tag} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Await `work`, rejecting with TimeoutError after `ms`
 *
 * @param onTimeout - Called when the timer fires, e.g. to abort the work
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  tag: string,
  onTimeout?: () => void
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(tag, ms));
    }, ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default {
  sleep,
  withTimeout,
  errorMessage,
  TimeoutError,
};
