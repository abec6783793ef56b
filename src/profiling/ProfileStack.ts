/**
 * ProfileStack
 *
 * Tree of named, timed spans built through a strict LIFO enter/exit API.
 * A synthetic root entry always sits at the bottom of the open stack and
 * holds every top-level span as a child.
 *
 * Flow:
 * enter(name) → span appended under the innermost open span, then pushed
 * exit()      → innermost span popped and its duration fixed
 * render()    → one markdown list line per closed span, pre-order
 */

import { hrtimeClock } from '../core/clock.js';
import { InvalidDurationError, StackUnderflowError } from '../core/errors.js';
import type { ClosedProfileEntry, ProfileEntry, ProfileStackOptions } from './types.js';

const DEFAULT_PROFILE_STACK_OPTIONS: ProfileStackOptions = {
  rootName: 'session',
  clock: hrtimeClock
};

/**
 * Nanoseconds to milliseconds, truncated to two decimals
 */
export function formatDurationMs(elapsedNs: number): number {
  return Math.floor(elapsedNs / 1e6 * 100) / 100;
}

export function formatProfileLine(name: string, elapsedNs: number, depth: number): string {
  return `${'  '.repeat(depth)}- ${name}: **${formatDurationMs(elapsedNs)}ms**`;
}

function* renderEntries(entries: readonly ProfileEntry[], depth: number): Generator<string> {
  for (const entry of entries) {
    // Spans still open have no duration yet; their subtree is skipped with them
    if (entry.elapsed === null) continue;
    yield formatProfileLine(entry.name, entry.elapsed, depth);
    yield* renderEntries(entry.children, depth + 1);
  }
}

export class ProfileStack {
  private options: ProfileStackOptions;
  private rootEntry: ProfileEntry;
  private openStack: ProfileEntry[];

  constructor(options: Partial<ProfileStackOptions> = {}) {
    this.options = { ...DEFAULT_PROFILE_STACK_OPTIONS, ...options };
    this.rootEntry = this.createRoot();
    this.openStack = [this.rootEntry];
  }

  get root(): ProfileEntry {
    return this.rootEntry;
  }

  /**
   * Number of open spans, not counting the root
   */
  get depth(): number {
    return this.openStack.length - 1;
  }

  /**
   * Open a span under the innermost open span
   */
  enter(name: string): ProfileEntry {
    const entry: ProfileEntry = {
      name,
      startTime: this.options.clock.now(),
      elapsed: null,
      children: []
    };
    this.top().children.push(entry);
    this.openStack.push(entry);
    return entry;
  }

  /**
   * Close the innermost open span
   */
  exit(): ClosedProfileEntry {
    // The root never leaves the stack
    const entry = this.openStack.length > 1 ? this.openStack.pop() : undefined;
    if (!entry) {
      throw new StackUnderflowError(this.rootEntry.name);
    }
    const elapsed = Math.max(0, this.options.clock.now() - entry.startTime);
    return Object.assign(entry, { elapsed });
  }

  /**
   * Attach a span that was measured elsewhere. It is closed on arrival and
   * never becomes the innermost open span.
   */
  record(name: string, elapsedNs: number): ClosedProfileEntry {
    if (!Number.isFinite(elapsedNs) || elapsedNs < 0) {
      throw new InvalidDurationError(name, elapsedNs);
    }
    const entry: ClosedProfileEntry = {
      name,
      startTime: this.options.clock.now() - elapsedNs,
      elapsed: elapsedNs,
      children: []
    };
    this.top().children.push(entry);
    return entry;
  }

  /**
   * Run `fn` inside a span; the span closes even when `fn` throws
   */
  measure<T>(name: string, fn: () => T): T {
    const entry = this.enter(name);
    try {
      return fn();
    } finally {
      this.exitIfTop(entry);
    }
  }

  async measureAsync<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const entry = this.enter(name);
    try {
      return await fn();
    } finally {
      this.exitIfTop(entry);
    }
  }

  /**
   * Drop every span and start over with a fresh root
   */
  clear(): void {
    this.rootEntry = this.createRoot();
    this.openStack = [this.rootEntry];
  }

  /**
   * Lines for every closed span, depth-first. Each iteration walks the
   * tree again, so the result can be consumed more than once.
   */
  render(): Iterable<string> {
    const root = this.rootEntry;
    return {
      [Symbol.iterator]: () => renderEntries(root.children, 1)
    };
  }

  /**
   * Close `entry` only while it is the innermost open span
   */
  private exitIfTop(entry: ProfileEntry): void {
    if (this.top() === entry) {
      this.exit();
    }
  }

  private top(): ProfileEntry {
    return this.openStack[this.openStack.length - 1];
  }

  private createRoot(): ProfileEntry {
    return {
      name: this.options.rootName,
      startTime: this.options.clock.now(),
      elapsed: null,
      children: []
    };
  }
}
