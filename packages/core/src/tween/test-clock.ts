/**
 * TestClock — deterministic clock for scheduler tests.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock that advances time only when explicitly told to.
 * Frame callbacks fire synchronously during `advance()`.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const tweener = new Tweener({ clock });
 * tweener.tween({ kind: DOUBLE, set, from: 0, to: 1, duration: 1 });
 *
 * clock.advance(500); // one frame, 0.5s of tween time
 * clock.advance(500); // tween reaches its end
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private nextId = 1;
  private scheduled = new Map<number, (timestamp: number) => void>();

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  /** Schedule a callback for the next frame. */
  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = this.nextId++;
    this.scheduled.set(id, callback);
    return {
      cancel: () => {
        this.scheduled.delete(id);
      },
    };
  }

  /**
   * Advance time by `ms` and fire every pending frame callback once.
   * Callbacks scheduled while firing wait for the next `advance()`.
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const callbacks = Array.from(this.scheduled.values());
    this.scheduled.clear();
    for (const callback of callbacks) {
      callback(this.currentTime);
    }
  }

  /** Advance `frames` frames of `ms` each. */
  advanceFrames(frames: number, ms: number): void {
    for (let i = 0; i < frames; i++) {
      this.advance(ms);
    }
  }

  /** Number of currently pending frame callbacks. */
  get pendingCount(): number {
    return this.scheduled.size;
  }
}
