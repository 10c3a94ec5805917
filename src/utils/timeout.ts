export class RelayTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'RelayTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Races `task` against a timer. The timer is cleared once either side settles;
 * `onTimeout` lets the caller abort the underlying work.
 */
export function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new RelayTimeoutError(operation, timeoutMs));
    }, timeoutMs);
    timer.unref?.();

    task.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
