/**
 * ProfileStack Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ProfileStack, formatDurationMs, formatProfileLine } from './ProfileStack.js';
import { InvalidDurationError, StackUnderflowError } from '../core/errors.js';
import { ManualClock } from '../test/fakes.js';

describe('ProfileStack', () => {
  let clock: ManualClock;
  let stack: ProfileStack;

  beforeEach(() => {
    clock = new ManualClock();
    stack = new ProfileStack({ clock });
  });

  describe('enter / exit', () => {
    it('should render nothing for a fresh stack', () => {
      expect(Array.from(stack.render())).toEqual([]);
      expect(stack.depth).toBe(0);
      expect(stack.root.name).toBe('session');
    });

    it('should nest a span opened inside another', () => {
      stack.enter('a');
      clock.advance(1_500_000);
      stack.enter('b');
      clock.advance(2_345_678);
      const b = stack.exit();
      clock.advance(1_000_000);
      const a = stack.exit();

      expect(stack.root.children).toHaveLength(1);
      expect(stack.root.children[0]).toBe(a);
      expect(a.children).toEqual([b]);
      expect(b.elapsed).toBe(2_345_678);
      expect(a.elapsed).toBe(4_845_678);

      expect(Array.from(stack.render())).toEqual([
        '  - a: **4.84ms**',
        '    - b: **2.34ms**'
      ]);
    });

    it('should keep siblings in call order and indent by nesting depth', () => {
      stack.enter('a');
      stack.exit();
      stack.enter('b');
      stack.enter('c');
      stack.exit();
      stack.exit();

      expect(Array.from(stack.render())).toEqual([
        '  - a: **0ms**',
        '  - b: **0ms**',
        '    - c: **0ms**'
      ]);
    });

    it('should return the entry from enter and track depth', () => {
      const entry = stack.enter('load');
      expect(entry.name).toBe('load');
      expect(entry.elapsed).toBeNull();
      expect(stack.depth).toBe(1);

      stack.enter('inner');
      expect(stack.depth).toBe(2);
      stack.exit();
      stack.exit();
      expect(stack.depth).toBe(0);
    });

    it('should throw StackUnderflowError when only the root is open', () => {
      expect(() => stack.exit()).toThrow(StackUnderflowError);

      stack.enter('a');
      stack.exit();
      expect(() => stack.exit()).toThrow(StackUnderflowError);
    });

    it('should name the root in the underflow message', () => {
      const named = new ProfileStack({ clock, rootName: 'startup' });
      expect(() => named.exit()).toThrow('only the root "startup" is open');
    });

    it('should never produce a negative duration', () => {
      clock.set(5_000);
      stack.enter('skewed');
      clock.set(1_000);
      expect(stack.exit().elapsed).toBe(0);
    });
  });

  describe('render', () => {
    it('should be restartable', () => {
      stack.enter('a');
      clock.advance(1_000_000);
      stack.exit();

      const lines = stack.render();
      expect(Array.from(lines)).toEqual(['  - a: **1ms**']);
      expect(Array.from(lines)).toEqual(['  - a: **1ms**']);
    });

    it('should not mutate the tree', () => {
      stack.enter('a');
      stack.exit();
      const before = JSON.stringify(stack.root);
      Array.from(stack.render());
      expect(JSON.stringify(stack.root)).toBe(before);
    });

    it('should skip spans that are still open along with their children', () => {
      stack.enter('done');
      stack.exit();
      stack.enter('open');
      stack.enter('closed-inside-open');
      stack.exit();

      expect(Array.from(stack.render())).toEqual(['  - done: **0ms**']);
    });

    it('should keep sub-microsecond spans', () => {
      stack.enter('tiny');
      clock.advance(300);
      stack.exit();

      expect(Array.from(stack.render())).toEqual(['  - tiny: **0ms**']);
    });
  });

  describe('record', () => {
    it('should attach a closed span under the innermost open span', () => {
      stack.enter('parent');
      const recorded = stack.record('cached', 2_500_000);
      expect(stack.depth).toBe(1);
      clock.advance(3_000_000);
      stack.exit();

      expect(recorded.elapsed).toBe(2_500_000);
      expect(Array.from(stack.render())).toEqual([
        '  - parent: **3ms**',
        '    - cached: **2.5ms**'
      ]);
    });

    it('should reject negative and non-finite durations', () => {
      expect(() => stack.record('bad', -1)).toThrow(InvalidDurationError);
      expect(() => stack.record('bad', Number.NaN)).toThrow(InvalidDurationError);
      expect(stack.root.children).toHaveLength(0);
    });
  });

  describe('measure', () => {
    it('should wrap a function in a span and return its result', () => {
      const result = stack.measure('work', () => {
        clock.advance(1_250_000);
        return 42;
      });

      expect(result).toBe(42);
      expect(Array.from(stack.render())).toEqual(['  - work: **1.25ms**']);
    });

    it('should close the span when the function throws', () => {
      expect(() => stack.measure('boom', () => {
        throw new Error('failed');
      })).toThrow('failed');

      expect(stack.depth).toBe(0);
      expect(stack.root.children[0].elapsed).toBe(0);
    });

    it('should rethrow the callback error when the callback already closed its span', () => {
      expect(() => stack.measure('x', () => {
        stack.exit();
        throw new Error('original');
      })).toThrow('original');

      expect(stack.depth).toBe(0);
      expect(Array.from(stack.render())).toEqual(['  - x: **0ms**']);
    });

    it('should rethrow an async callback error after the callback closed its span', async () => {
      await expect(stack.measureAsync('x', async () => {
        stack.exit();
        throw new Error('original');
      })).rejects.toThrow('original');

      expect(stack.depth).toBe(0);
    });

    it('should close its own span after nested spans the callback closed', () => {
      stack.measure('outer', () => {
        stack.enter('inner');
        stack.exit();
      });

      expect(stack.depth).toBe(0);
      expect(Array.from(stack.render())).toEqual([
        '  - outer: **0ms**',
        '    - inner: **0ms**'
      ]);
    });

    it('should close the span after an async function settles', async () => {
      const result = await stack.measureAsync('async', async () => {
        clock.advance(2_000_000);
        return 'ok';
      });

      expect(result).toBe('ok');
      expect(stack.depth).toBe(0);
      expect(Array.from(stack.render())).toEqual(['  - async: **2ms**']);
    });
  });

  describe('clear', () => {
    it('should drop every span and reopen the root', () => {
      stack.enter('a');
      stack.enter('b');
      stack.clear();

      expect(stack.depth).toBe(0);
      expect(stack.root.children).toEqual([]);
      expect(Array.from(stack.render())).toEqual([]);
      expect(() => stack.exit()).toThrow(StackUnderflowError);
    });
  });
});

describe('formatDurationMs', () => {
  it('should truncate to two decimals', () => {
    expect(formatDurationMs(1_234_567)).toBe(1.23);
    expect(formatDurationMs(999)).toBe(0);
    expect(formatDurationMs(10_000_000)).toBe(10);
  });

  it('should build a markdown list line', () => {
    expect(formatProfileLine('x', 1_500_000, 3)).toBe('      - x: **1.5ms**');
  });
});
