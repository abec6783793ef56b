/**
 * Clock and timer primitives
 *
 * The profiling stack reads time through a Clock and the throttle schedules
 * through a TimerHost, so both can be driven by hand in tests.
 */

/**
 * Monotonic time source in nanoseconds
 */
export interface Clock {
  now(): number;
}

/**
 * One-shot scheduling primitives
 */
export interface TimerHost {
  /** Run `callback` once after `ms` milliseconds */
  after(ms: number, callback: () => void): void;
  /** Run `callback` on the next event-loop turn */
  defer(callback: () => void): void;
}

const hrtimeOrigin = process.hrtime.bigint();

/**
 * Nanoseconds since this module loaded. Offsetting in bigint keeps the
 * value within Number's exact integer range on long-running hosts.
 */
export const hrtimeClock: Clock = {
  now: () => Number(process.hrtime.bigint() - hrtimeOrigin)
};

export const nodeTimers: TimerHost = {
  after(ms, callback) {
    setTimeout(callback, ms);
  },
  defer(callback) {
    setImmediate(callback);
  }
};
