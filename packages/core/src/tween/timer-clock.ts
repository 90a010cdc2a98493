/**
 * TimerClock — frame clock for Node.js and other hosts without
 * `requestAnimationFrame`. Uses the global timers, so it also runs in
 * browsers and workers.
 */

import type { CancelHandle, Clock } from "./clock.js";

/** Options for a TimerClock. */
export interface TimerClockOptions {
  /** Milliseconds between frames. Defaults to 16 (about 60 fps). */
  readonly frameInterval?: number;
  /**
   * Keep the process alive while a frame is pending. Defaults to true;
   * set to false for background animation that should not block exit.
   */
  readonly keepAlive?: boolean;
}

/**
 * A clock that fires frames from `setTimeout`.
 *
 * @example
 * ```ts
 * const tweener = new Tweener({ clock: new TimerClock({ frameInterval: 33 }) });
 * ```
 */
export class TimerClock implements Clock {
  readonly frameInterval: number;
  private readonly keepAlive: boolean;

  constructor(options: TimerClockOptions = {}) {
    const interval = options.frameInterval ?? 16;
    this.frameInterval = Number.isFinite(interval) && interval > 0 ? interval : 16;
    this.keepAlive = options.keepAlive ?? true;
  }

  now(): number {
    return performance.now();
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const timer: ReturnType<typeof setTimeout> = setTimeout(() => {
      callback(this.now());
    }, this.frameInterval);
    if (!this.keepAlive) {
      unrefTimer(timer);
    }
    return { cancel: () => clearTimeout(timer) };
  }
}

/** Let the process exit while `timer` is pending. Browser timer ids have no `unref`. */
function unrefTimer(timer: unknown): void {
  if (typeof timer === "object" && timer !== null && "unref" in timer && typeof timer.unref === "function") {
    timer.unref();
  }
}
