/**
 * Clock abstraction for the tween scheduler.
 *
 * Lets the scheduler run on `requestAnimationFrame` in the browser, on
 * timers in Node.js, or on manually advanced time in tests.
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/**
 * Time source and frame scheduler.
 *
 * The scheduler never reads wall time or requests frames itself. It always
 * goes through a Clock, so tests can drive playback with a TestClock.
 */
export interface Clock {
  /** Current time in milliseconds (monotonic). */
  now(): number;

  /**
   * Request a callback on the next frame.
   *
   * @param callback - Receives the current timestamp in ms.
   * @returns A handle to cancel the scheduled callback.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle;
}
