export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => {
      if (ms <= 0) return resolve();
      setTimeout(resolve, ms);
    }),
};
