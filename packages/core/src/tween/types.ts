/**
 * Shared tween types — play directions, loop policies and the contract
 * every unit in a tween tree implements.
 */

/** Direction in which a tween tree is driven. */
export type PlayDirection = "forward" | "reverse";

/**
 * What a loop wrapper does when its inner unit reaches a time boundary.
 *
 * - `none`: stop at the boundary.
 * - `repeat`: restart from the same boundary, forever.
 * - `reflect`: play forward, then back once, then stop.
 * - `pingPong`: alternate forward and back, forever.
 */
export type LoopType = "none" | "repeat" | "reflect" | "pingPong";

/**
 * How a reset treats values captured at the start of a pass.
 *
 * - `restart`: read the start and original value sources again.
 * - `rewind`: keep the captured values, only move the playhead.
 */
export type ResetMode = "restart" | "rewind";

/**
 * A bidirectional, time-integrating unit of animation.
 *
 * Raw tweens, loop wrappers, chains, delays and handles all implement it,
 * so they nest freely.
 */
export interface Advanceable {
  /**
   * Advance by `delta` seconds in `direction`.
   *
   * @returns `false` when the unit cannot move further in that direction.
   * The caller should stop driving it (or switch to something else).
   */
  advance(direction: PlayDirection, delta: number): boolean;

  /**
   * Prepare the unit to play from the boundary matching `direction`.
   * Applied lazily by the next `advance`, whichever direction that advance
   * moves in. Nothing is written until then.
   */
  reset(direction: PlayDirection, mode?: ResetMode): void;

  /** Last value this unit delivered, if any. Informational only. */
  readonly current: unknown;
}

/** Receives interpolated values. Called at most once per tick that produces one. */
export type Setter<T> = (value: T) => void;

/** Reads the value being animated. Called lazily, at most once per (re)start. */
export type Getter<T> = () => T;

/** The opposite play direction. */
export function flipDirection(direction: PlayDirection): PlayDirection {
  return direction === "forward" ? "reverse" : "forward";
}

/** The signed multiplier for a play direction: +1 forward, -1 reverse. */
export function directionSign(direction: PlayDirection): 1 | -1 {
  return direction === "forward" ? 1 : -1;
}
