/**
 * Time source for delay checks. Injected so tests can move time explicitly.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const toUnixSeconds = (clock: Clock): number => Math.floor(clock.now() / 1000);
