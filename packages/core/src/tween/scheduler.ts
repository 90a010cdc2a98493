/**
 * Scheduler — the frame loop that drives registered tween handles.
 *
 * Each tick, every registered handle is advanced forward by the elapsed
 * time; handles that report they cannot advance any more are dropped.
 * Ticks come either from a {@link Clock} or from the host calling `step()`
 * with its own delta.
 */

import type { CancelHandle, Clock } from "./clock.js";
import { describeError } from "./errors.js";
import type { TweenHandle, TweenHost } from "./handle.js";
import { warn } from "./log.js";

/** Options for creating a TweenScheduler. */
export interface TweenSchedulerOptions {
  /**
   * Frame source. When omitted the scheduler only moves when `step()` is
   * called.
   */
  readonly clock?: Clock;
  /** Multiplier applied to every delta. Defaults to 1. */
  readonly timeScale?: number;
}

/**
 * Drives tween handles.
 *
 * Handles are independent: no evaluation order between them is guaranteed.
 * Handles registered during a step are first advanced on the next one.
 */
export class TweenScheduler implements TweenHost {
  /** Multiplier applied to every delta. 1 = real time, 0.5 = half speed. */
  timeScale: number;
  private readonly clock: Clock | null;
  private readonly handles = new Set<TweenHandle>();
  private frameHandle: CancelHandle | null = null;
  private running = false;
  private lastTimestamp = 0;

  constructor(options: TweenSchedulerOptions = {}) {
    this.clock = options.clock ?? null;
    this.timeScale = options.timeScale ?? 1;
  }

  add(handle: TweenHandle): void {
    this.handles.add(handle);
    this.ensureRunning();
  }

  remove(handle: TweenHandle): boolean {
    const removed = this.handles.delete(handle);
    if (this.handles.size === 0) {
      this.stopLoop();
    }
    return removed;
  }

  has(handle: TweenHandle): boolean {
    return this.handles.has(handle);
  }

  /** Number of registered handles. */
  get activeCount(): number {
    return this.handles.size;
  }

  /**
   * Advance every registered handle by `deltaSeconds` (scaled by
   * `timeScale`). Negative or non-finite deltas count as 0.
   */
  step(deltaSeconds: number): void {
    const delta = sanitizeDelta(deltaSeconds) * this.timeScale;

    for (const handle of Array.from(this.handles)) {
      // A setter earlier in this step may have stopped it.
      if (!this.handles.has(handle)) {
        continue;
      }
      let advanced: boolean;
      try {
        advanced = handle.advance("forward", delta);
      } catch (error) {
        warn(`tween handle failed and was removed: ${describeError(error)}`);
        advanced = false;
      }
      if (!advanced) {
        this.handles.delete(handle);
        handle.settle();
      }
    }

    if (this.handles.size === 0) {
      this.stopLoop();
    }
  }

  /** Stop every registered handle. Values stay where they are. */
  stopAll(): void {
    for (const handle of Array.from(this.handles)) {
      handle.stop();
    }
  }

  /** Stop the frame loop and drop all handles. */
  dispose(): void {
    this.stopAll();
    this.stopLoop();
  }

  // ---------------------------------------------------------------------------
  // Frame loop
  // ---------------------------------------------------------------------------

  private ensureRunning(): void {
    if (!this.clock || this.running) {
      return;
    }
    this.running = true;
    this.lastTimestamp = this.clock.now();
    this.scheduleFrame(this.clock);
  }

  private scheduleFrame(clock: Clock): void {
    this.frameHandle = clock.requestFrame((timestamp) => {
      this.frameHandle = null;
      this.tick(clock, timestamp);
    });
  }

  private stopLoop(): void {
    this.running = false;
    if (this.frameHandle) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  private tick(clock: Clock, timestamp: number): void {
    const deltaMs = timestamp - this.lastTimestamp;
    this.lastTimestamp = timestamp;
    this.step(deltaMs / 1000);

    if (this.running && this.handles.size > 0 && !this.frameHandle) {
      this.scheduleFrame(clock);
    }
  }
}

function sanitizeDelta(delta: number): number {
  return Number.isFinite(delta) && delta > 0 ? delta : 0;
}
