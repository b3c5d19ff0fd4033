export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, label = 'operation') {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Runs a request and `read` on its response under one deadline. The abort
 * signal stays armed until `read` settles, so a body that stalls after the
 * headers still times out.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
  fetchFn: FetchFn = fetch,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, { ...options, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(timeoutMs, `POST ${url}`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/** Races `promise` against a timer; the timer is always cleared. */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
