/**
 * In-process stand-ins for the clock and timers
 */

import type { Clock, TimerHost } from '../core/clock.js';

export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ns: number): void {
    this.current += ns;
  }

  set(ns: number): void {
    this.current = ns;
  }
}

interface ScheduledTimer {
  at: number;
  callback: () => void;
}

/**
 * Timers that only move when the test says so. `advance` fires due timers;
 * callbacks they defer wait for `flushDeferred`, like a real next turn.
 */
export class ManualTimers implements TimerHost {
  private nowMs = 0;
  private timers: ScheduledTimer[] = [];
  private deferred: Array<() => void> = [];

  get pendingTimers(): number {
    return this.timers.length;
  }

  get pendingDeferred(): number {
    return this.deferred.length;
  }

  after(ms: number, callback: () => void): void {
    this.timers.push({ at: this.nowMs + ms, callback });
  }

  defer(callback: () => void): void {
    this.deferred.push(callback);
  }

  advance(ms: number): void {
    this.nowMs += ms;
    const due = this.timers.filter(timer => timer.at <= this.nowMs);
    this.timers = this.timers.filter(timer => timer.at > this.nowMs);
    for (const timer of due) {
      timer.callback();
    }
  }

  flushDeferred(): void {
    const queue = this.deferred;
    this.deferred = [];
    for (const callback of queue) {
      callback();
    }
  }
}
