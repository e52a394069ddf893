/**
 * Time source for every wait the client performs (lag back-off, mutation
 * throttle, login cool-down). Tests substitute a clock that advances
 * instantly.
 */

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => (ms > 0 ? sleep(ms) : Promise.resolve()),
};
