/**
 * TweenHandle — the caller-facing control object for a running tween or
 * chain of tweens.
 */

import { Chain } from "./chain.js";
import { LoopWrapper } from "./loop.js";
import { warn } from "./log.js";
import type { Advanceable, LoopType, PlayDirection, ResetMode } from "./types.js";

/**
 * The driver a handle registers with.
 * {@link TweenScheduler} is the standard implementation.
 */
export interface TweenHost {
  /** Start driving `handle` from the next tick. */
  add(handle: TweenHandle): void;
  /** Stop driving `handle`. Returns whether it was registered. */
  remove(handle: TweenHandle): boolean;
  /** Whether `handle` is currently driven. */
  has(handle: TweenHandle): boolean;
}

/** An advanceable that never moves. Backs handles for rejected tweens. */
const INERT: Advanceable = {
  advance: () => false,
  reset: () => {},
  current: undefined,
};

/**
 * Handle to a tween tree registered with a host.
 *
 * A handle is itself advanceable and carries its own loop policy, so a
 * chain of handles can be looped as a whole. Handles are registered with
 * their host as soon as they are created.
 *
 * @example
 * ```ts
 * const move = tweener.tween({ kind: DOUBLE, set: setX, from: 0, to: 10, duration: 1 });
 * const back = tweener.tween({ kind: DOUBLE, set: setX, from: 10, to: 0, duration: 1 });
 * const trip = move.then(back); // move and back are now owned by trip
 * trip.loop = "repeat";
 * ```
 */
export class TweenHandle implements Advanceable {
  private readonly host: TweenHost;
  private readonly looper: LoopWrapper;
  private owner: TweenHandle | null = null;
  private waiters: Array<() => void> = [];

  constructor(root: Advanceable, host: TweenHost, loop: LoopType = "none") {
    this.host = host;
    this.looper = new LoopWrapper(root, loop);
    host.add(this);
  }

  /** A registered handle that reports it cannot advance on its first tick. */
  static inert(host: TweenHost): TweenHandle {
    return new TweenHandle(INERT, host);
  }

  /** Loop policy applied to the whole tree under this handle. */
  get loop(): LoopType {
    return this.looper.loop;
  }

  set loop(loop: LoopType) {
    this.looper.loop = loop;
  }

  /** Whether the host is currently driving this handle. */
  get isActive(): boolean {
    return this.host.has(this);
  }

  /** Whether this handle was chained into another one and is no longer independent. */
  get isAbsorbed(): boolean {
    return this.owner !== null;
  }

  /** Last value produced anywhere in the tree. Informational only. */
  get current(): unknown {
    return this.looper.current;
  }

  advance(direction: PlayDirection, delta: number): boolean {
    return this.looper.advance(direction, delta);
  }

  reset(direction: PlayDirection, mode: ResetMode = "restart"): void {
    this.looper.reset(direction, mode);
  }

  /**
   * Chain `next` after this handle.
   *
   * Both handles are deregistered and owned by the returned handle from
   * then on; drive or stop the returned handle instead. Chaining a handle
   * that is already owned by a chain, or a handle with itself, yields an
   * inert handle.
   */
  then(next: TweenHandle): TweenHandle {
    if (next === this) {
      warn("InvalidArgument: cannot chain a tween handle with itself.");
      return TweenHandle.inert(this.host);
    }
    if (this.isAbsorbed || next.isAbsorbed) {
      warn("InvalidArgument: tween handle is already part of a chain.");
      return TweenHandle.inert(this.host);
    }

    const composite = new TweenHandle(new Chain(this, next), this.host);
    this.absorbInto(composite);
    next.absorbInto(composite);
    return composite;
  }

  /** Stop driving this handle. The last value set stays in place. */
  stop(): void {
    if (this.host.remove(this)) {
      this.settle();
    }
  }

  /** Play again from the start, re-reading start values from their sources. */
  restart(): void {
    if (this.owner) {
      warn("restart() ignored: tween handle is part of a chain; restart the chain instead.");
      return;
    }
    this.host.remove(this);
    this.reset("forward", "restart");
    this.host.add(this);
  }

  /**
   * Resolves the next time this handle leaves its host, either because it
   * finished or because it was stopped. Resolves immediately when it is not
   * active. For a chained handle, follows the chain that owns it.
   */
  finished(): Promise<void> {
    if (this.owner) {
      return this.owner.finished();
    }
    if (!this.isActive) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** @internal Called by the host after it dropped this handle. */
  settle(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private absorbInto(owner: TweenHandle): void {
    this.host.remove(this);
    this.owner = owner;
    owner.waiters.push(...this.waiters);
    this.waiters = [];
  }
}
