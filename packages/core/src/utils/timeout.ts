/** Largest delay `setTimeout` honours; anything above fires immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class TimeoutError extends Error {
  public constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutOptions<T> {
  label: string;
  timeoutMs: number;
  /** The signal is aborted, with the `TimeoutError` as its reason, when time runs out. */
  run: (signal: AbortSignal) => Promise<T>;
}

/**
 * Settles with `run`'s outcome, or rejects with `TimeoutError` after
 * `timeoutMs` and aborts the signal handed to `run`.
 */
export function withTimeout<T>({ label, timeoutMs, run }: TimeoutOptions<T>): Promise<T> {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    return Promise.reject(new RangeError(`timeoutMs must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    run(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
