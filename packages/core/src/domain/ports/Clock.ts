/** Time source. Injected so that waits can be simulated in tests. */
export interface Clock {
  /** Milliseconds since an arbitrary origin. Only differences are meaningful. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
};
