/**
 * HostLifecycle
 *
 * Startup events of the editor host, plus the derived "very-lazy" event
 * fired a short delay after both plugin loading is done and the host has
 * finished entering.
 *
 * Flow:
 * done → (host already entered) → wait delay → very-lazy
 * done → (not entered yet) → enter → wait delay → very-lazy
 */

import { EventEmitter } from 'events';

import type { PlugkitConfig } from '../config/types.js';
import { nodeTimers, type TimerHost } from '../core/clock.js';

/**
 * done: all plugins have been loaded
 * enter: the host finished its own startup
 */
export type HostLifecycleEvent = 'done' | 'enter' | 'very-lazy';

export interface HostLifecycleOptions {
  veryLazyDelayMs: number;
  timers: TimerHost;
}

const DEFAULT_HOST_LIFECYCLE_OPTIONS: HostLifecycleOptions = {
  veryLazyDelayMs: 100,
  timers: nodeTimers
};

export class HostLifecycle {
  private emitter = new EventEmitter();
  private options: HostLifecycleOptions;
  private entered = false;
  private scheduled = false;

  constructor(options: Partial<HostLifecycleOptions> = {}) {
    this.options = { ...DEFAULT_HOST_LIFECYCLE_OPTIONS, ...options };
  }

  static fromConfig(config: Pick<PlugkitConfig, 'veryLazyDelayMs'>, timers: TimerHost = nodeTimers): HostLifecycle {
    return new HostLifecycle({ veryLazyDelayMs: config.veryLazyDelayMs, timers });
  }

  get didEnter(): boolean {
    return this.entered;
  }

  on(event: HostLifecycleEvent, listener: () => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Record that the host finished entering and notify `enter` listeners
   */
  markEntered(): void {
    this.entered = true;
    this.emitter.emit('enter');
  }

  /**
   * Notify `done` listeners that plugin loading finished
   */
  markDone(): void {
    this.emitter.emit('done');
  }

  /**
   * Arrange for `very-lazy` to fire once, after `done` and host entry
   */
  scheduleVeryLazy(): void {
    if (this.scheduled) return;
    this.scheduled = true;

    const load = () => {
      this.options.timers.after(this.options.veryLazyDelayMs, () => {
        this.emitter.emit('very-lazy');
      });
    };

    this.emitter.once('done', () => {
      if (this.entered) {
        load();
      } else {
        this.emitter.once('enter', load);
      }
    });
  }
}
