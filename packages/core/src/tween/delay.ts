/**
 * Delay — a reversible pause, used to space out chained tweens.
 */

import { warn } from "./log.js";
import { directionSign } from "./types.js";
import type { Advanceable, PlayDirection } from "./types.js";

/**
 * Lets time pass without producing values.
 *
 * Follows the same boundary rules as a tween: the step that reaches the
 * end still succeeds, the next one in that direction reports `false`.
 * A delay that is not a positive, finite number of seconds is inert.
 */
export class Delay implements Advanceable {
  readonly length: number;
  private elapsed = 0;
  private pendingReset: PlayDirection | null = "forward";

  constructor(seconds: number) {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      warn(`delay must be a positive number of seconds (got ${String(seconds)}). Will be skipped.`);
      this.length = 0;
    } else {
      this.length = seconds;
    }
  }

  /** Elapsed time in seconds, in [0, length]. */
  get elapsedTime(): number {
    return this.elapsed;
  }

  get current(): undefined {
    return undefined;
  }

  advance(direction: PlayDirection, delta: number): boolean {
    if (this.length === 0) {
      return false;
    }
    if (this.pendingReset) {
      this.elapsed = this.pendingReset === "forward" ? 0 : this.length;
      this.pendingReset = null;
    } else if (
      (direction === "forward" && this.elapsed >= this.length) ||
      (direction === "reverse" && this.elapsed <= 0)
    ) {
      return false;
    }

    const next = this.elapsed + directionSign(direction) * delta;
    const tolerance = this.length * 1e-9;
    if (next >= this.length - tolerance) {
      this.elapsed = this.length;
    } else if (next <= tolerance) {
      this.elapsed = 0;
    } else {
      this.elapsed = next;
    }
    return true;
  }

  reset(direction: PlayDirection): void {
    this.pendingReset = direction;
  }
}
