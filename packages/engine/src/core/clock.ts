/**
 * Time source for budgeted searches. Tests inject a manual clock.
 */
export interface Clock {
  /** Milliseconds from an arbitrary origin */
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};
