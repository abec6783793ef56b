/**
 * Profiling Types
 */

import type { Clock } from '../core/clock.js';

/**
 * A named, timed span. `elapsed` stays null until the span is closed.
 */
export interface ProfileEntry {
  name: string;
  /** Monotonic start timestamp in nanoseconds */
  startTime: number;
  /** Duration in nanoseconds once closed */
  elapsed: number | null;
  children: ProfileEntry[];
}

/**
 * A closed span, as returned by exit() and record()
 */
export interface ClosedProfileEntry extends ProfileEntry {
  elapsed: number;
}

export interface ProfileStackOptions {
  /** Name of the synthetic root entry */
  rootName: string;
  clock: Clock;
}
