/**
 * LoopWrapper — applies a loop policy to any advanceable unit.
 *
 * When the inner unit reports that it cannot move further, the policy
 * decides whether the wrapper ends too, restarts the inner unit from the
 * same boundary, or turns it around.
 */

import { flipDirection } from "./types.js";
import type { Advanceable, LoopType, PlayDirection, ResetMode } from "./types.js";

/**
 * Decorates an advanceable with a {@link LoopType}.
 *
 * Reflect and ping-pong share one mechanism: the wrapper keeps a `reversed`
 * flag and drives its inner unit against the requested direction while it
 * is set. Ping-pong flips at every boundary. Reflect flips only at the far
 * boundary of the pass it started with, so it plays out and back once.
 */
export class LoopWrapper implements Advanceable {
  /** Loop policy. Can be changed while playing. */
  loop: LoopType;
  private readonly inner: Advanceable;
  private reversed = false;

  constructor(inner: Advanceable, loop: LoopType = "none") {
    this.inner = inner;
    this.loop = loop;
  }

  /** Whether the inner unit is currently driven against the requested direction. */
  get isReversed(): boolean {
    return this.reversed;
  }

  get current(): unknown {
    return this.inner.current;
  }

  reset(direction: PlayDirection, mode: ResetMode = "restart"): void {
    if (this.loop === "pingPong" || this.loop === "reflect") {
      this.reversed = direction === "reverse";
      this.inner.reset("forward", mode);
    } else {
      this.reversed = false;
      this.inner.reset(direction, mode);
    }
  }

  advance(direction: PlayDirection, delta: number): boolean {
    const effective = this.reversed ? flipDirection(direction) : direction;
    if (this.inner.advance(effective, delta)) {
      return true;
    }

    switch (this.loop) {
      case "repeat":
        this.inner.reset(effective, "rewind");
        return this.inner.advance(effective, delta);
      case "reflect":
        // Only the boundary that ends the outbound pass turns around.
        if (this.reversed !== (direction === "reverse")) {
          return false;
        }
        return this.turnAround(effective, delta);
      case "pingPong":
        return this.turnAround(effective, delta);
      case "none":
        return false;
    }
  }

  private turnAround(effective: PlayDirection, delta: number): boolean {
    this.reversed = !this.reversed;
    const next = flipDirection(effective);
    this.inner.reset(next, "rewind");
    return this.inner.advance(next, delta);
  }
}
