/**
 * BrowserClock — frame clock backed by `requestAnimationFrame`.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock backed by `performance.now()` and `requestAnimationFrame`.
 *
 * @example
 * ```ts
 * const tweener = new Tweener({ clock: new BrowserClock() });
 * // tweens now advance once per display frame
 * ```
 */
export class BrowserClock implements Clock {
  now(): number {
    return performance.now();
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = requestAnimationFrame(callback);
    return { cancel: () => cancelAnimationFrame(id) };
  }
}
