export const CLOCK = Symbol('CLOCK');

export interface Clock {
  /** Milliseconds on a monotonic-enough scale; only differences are used. */
  now(): number;
  sleep(ms: number): Promise<void>;
}
