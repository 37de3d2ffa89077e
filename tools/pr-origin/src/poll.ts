export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOptions<T> {
  /** Maximum number of fetches, at least 1 */
  attempts: number;
  /** Delay between two fetches */
  delayMs: number;
  fetch: (attempt: number) => Promise<T>;
  /** Stop polling as soon as this returns true */
  isDone: (value: T) => boolean;
  sleep?: Sleep;
}

export interface PollResult<T> {
  /** Value from the last fetch */
  value: T;
  attempts: number;
  /** Whether `isDone` accepted the last value */
  done: boolean;
}

/**
 * Fetch a value up to `attempts` times with a fixed delay in between,
 * returning early once `isDone` accepts it. There is no delay after the last
 * attempt. Errors from `fetch` propagate immediately.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<PollResult<T>> {
  const { attempts, delayMs, fetch, isDone, sleep = defaultSleep } = options;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new Error(`attempts must be a positive integer, got ${attempts}`);
  }

  let attempt = 1;
  for (;;) {
    const value = await fetch(attempt);
    if (isDone(value)) {
      return { value, attempts: attempt, done: true };
    }
    if (attempt >= attempts) {
      return { value, attempts: attempt, done: false };
    }
    await sleep(delayMs);
    attempt++;
  }
}
