export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `task` with an AbortSignal that fires when `timeoutMs` elapses, and
 * rejects with TimeoutError at that point. The timer is unref'd so a pending
 * timeout never keeps the process alive on its own.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label = "Task"
): Promise<T> {
  const controller = new AbortController();
  if (!(timeoutMs > 0)) return task(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
    timer.unref();
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
