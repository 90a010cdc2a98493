/**
 * Chain — plays two advanceable units one after the other, in either
 * direction.
 */

import type { Advanceable, PlayDirection, ResetMode } from "./types.js";

/** Which half of a chain is currently driven. */
export type ChainSide = "first" | "second";

/**
 * Concatenation of two advanceables.
 *
 * Crossing from one half to the other happens inside a single `advance`:
 * the tick that exhausts one half is spent on the next one, so a chain
 * boundary never costs a frame.
 */
export class Chain implements Advanceable {
  readonly first: Advanceable;
  readonly second: Advanceable;
  private side: ChainSide = "first";

  constructor(first: Advanceable, second: Advanceable) {
    this.first = first;
    this.second = second;
  }

  /** Half currently being driven. */
  get currentSide(): ChainSide {
    return this.side;
  }

  get current(): unknown {
    return this.unit(this.side).current;
  }

  advance(direction: PlayDirection, delta: number): boolean {
    if (this.unit(this.side).advance(direction, delta)) {
      return true;
    }

    const terminal: ChainSide = direction === "forward" ? "second" : "first";
    if (this.side === terminal) {
      return false;
    }
    this.side = terminal;
    return this.unit(terminal).advance(direction, delta);
  }

  reset(direction: PlayDirection, mode: ResetMode = "restart"): void {
    this.first.reset(direction, mode);
    this.second.reset(direction, mode);
    this.side = direction === "forward" ? "first" : "second";
  }

  private unit(side: ChainSide): Advanceable {
    return side === "first" ? this.first : this.second;
  }
}
