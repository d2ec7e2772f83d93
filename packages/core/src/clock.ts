/**
 * Time source passed into every store operation, so "now" is a dependency
 * rather than an ambient lookup.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock that only moves when told to. For tests and replays. */
export interface ManualClock extends Clock {
  set(instant: Date | string): void;
  advance(ms: number): void;
}

export function fixedClock(instant: Date | string): ManualClock {
  let current = new Date(instant).getTime();
  return {
    now: () => new Date(current),
    set: (next) => { current = new Date(next).getTime(); },
    advance: (ms) => { current += ms; },
  };
}
