/**
 * Tweener — the top-level facade that ties together the interpolator
 * registry, the scheduler and the tween building blocks.
 */

import { bindProperty } from "./binding.js";
import type { PropertyBinding } from "./binding.js";
import type { Clock } from "./clock.js";
import { Delay } from "./delay.js";
import { describeError } from "./errors.js";
import { TweenHandle } from "./handle.js";
import { interpolators } from "./interpolation.js";
import type { InterpolatorRegistry } from "./interpolation.js";
import { warn } from "./log.js";
import { RawTween } from "./raw-tween.js";
import type { RawTweenOptions } from "./raw-tween.js";
import { TweenScheduler } from "./scheduler.js";
import type { LoopType } from "./types.js";

/** Options for creating a Tweener. */
export interface TweenerOptions {
  /** Frame source. Without one, tweens only move when `step()` is called. */
  readonly clock?: Clock;
  /** Blend registry. Defaults to the process-wide `interpolators`. */
  readonly registry?: InterpolatorRegistry;
  /** Multiplier applied to every tick's delta. Defaults to 1. */
  readonly timeScale?: number;
}

/** Options for `Tweener.tween()`. */
export interface TweenOptions<T> extends RawTweenOptions<T> {
  /** Loop policy. Defaults to `"none"`. */
  readonly loop?: LoopType;
}

/**
 * Options for `Tweener.property()`. The getter and setter come from the
 * property; `from` defaults to the property's value when the tween starts.
 */
export type PropertyTweenOptions<T> = Omit<TweenOptions<T>, "set" | "get">;

/**
 * Entry point for creating tweens.
 *
 * @example
 * ```ts
 * const tweener = new Tweener({ clock: new TimerClock() });
 * const box = { x: 0, color: new Color(1, 1, 1) };
 *
 * tweener
 *   .property(box, "x", { kind: DOUBLE, to: 100, duration: 0.5, easing: bounceOut })
 *   .then(tweener.delay(0.3))
 *   .then(tweener.property(box, "color", { kind: COLOR, to: new Color(1, 0, 0), duration: 1 }));
 * ```
 */
export class Tweener {
  readonly scheduler: TweenScheduler;
  readonly registry: InterpolatorRegistry;

  constructor(options: TweenerOptions = {}) {
    this.scheduler = new TweenScheduler({
      clock: options.clock,
      timeScale: options.timeScale,
    });
    this.registry = options.registry ?? interpolators;
  }

  /**
   * Tween a value through a setter.
   *
   * Invalid options are reported as a warning and produce a handle that
   * finishes on its first tick without touching anything.
   */
  tween<T>(options: TweenOptions<T>): TweenHandle {
    const raw = new RawTween(options, this.registry);
    return new TweenHandle(raw, this.scheduler, options.loop ?? "none");
  }

  /**
   * Tween a property of an object. The value before the tween starts is
   * restored when the tween is played back past its start.
   */
  property<O extends object, K extends keyof O & string>(
    target: O,
    name: K,
    options: PropertyTweenOptions<O[K]>,
  ): TweenHandle {
    let binding: PropertyBinding<O[K]>;
    try {
      binding = bindProperty(target, name, options.kind);
    } catch (error) {
      warn(`property "${name}": ${describeError(error)}. Will not tween.`);
      return TweenHandle.inert(this.scheduler);
    }
    return this.tween<O[K]>({
      ...options,
      label: options.label ?? `property "${name}"`,
      get: binding.get,
      set: binding.set,
    });
  }

  /** A pause, for spacing out chained tweens. */
  delay(seconds: number): TweenHandle {
    return new TweenHandle(new Delay(seconds), this.scheduler);
  }

  /** Advance all tweens by `deltaSeconds`, for hosts that own the frame loop. */
  step(deltaSeconds: number): void {
    this.scheduler.step(deltaSeconds);
  }

  /** Number of handles currently playing. */
  get activeCount(): number {
    return this.scheduler.activeCount;
  }

  /** Stop every playing handle. Values stay where they are. */
  stopAll(): void {
    this.scheduler.stopAll();
  }

  /** Stop everything and release the frame loop. */
  dispose(): void {
    this.scheduler.dispose();
  }
}
