/**
 * Throttle
 *
 * Leading-edge throttle with a trailing call per cooldown window.
 *
 * States:
 * - IDLE: no timer armed
 * - COOLING: a one-shot timer is counting down, calls are dropped
 *
 * Flow:
 * IDLE → (call) → COOLING; the very first call ever also runs fn now
 * COOLING → (call) → COOLING, nothing happens
 * COOLING → (timer fires) → IDLE, fn runs on the next event-loop turn
 */

import { nodeTimers, type TimerHost } from '../core/clock.js';

export enum ThrottleState {
  IDLE = 'idle',
  COOLING = 'cooling'
}

export class Throttle {
  private cooldownMs: number;
  private fn: () => void;
  private timers: TimerHost;
  private pending = false;
  private firedOnce = false;

  constructor(cooldownMs: number, fn: () => void, timers: TimerHost = nodeTimers) {
    this.cooldownMs = cooldownMs;
    this.fn = fn;
    this.timers = timers;
  }

  get state(): ThrottleState {
    return this.pending ? ThrottleState.COOLING : ThrottleState.IDLE;
  }

  /**
   * True once the leading call has run
   */
  get hasFired(): boolean {
    return this.firedOnce;
  }

  call(): void {
    if (this.pending) return;

    if (!this.firedOnce) {
      // Marked only once fn returns without throwing
      this.fn();
      this.firedOnce = true;
    }

    this.timers.after(this.cooldownMs, () => {
      this.pending = false;
      this.timers.defer(this.fn);
    });
    this.pending = true;
  }
}

/**
 * Wrap `fn` so bursts of calls run it at most once up front and once
 * after each cooldown window
 */
export function makeThrottle(cooldownMs: number, fn: () => void, timers: TimerHost = nodeTimers): () => void {
  const throttle = new Throttle(cooldownMs, fn, timers);
  return () => throttle.call();
}
