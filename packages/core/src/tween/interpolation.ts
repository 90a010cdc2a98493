/**
 * Interpolator registry — maps value kinds to blend functions.
 *
 * Every tween resolves its blend once, at construction. Registrations can
 * change at any time and only affect tweens built afterwards.
 */

import { TweenError } from "./errors.js";
import { DOUBLE, FLOAT } from "./value-kind.js";
import type { BlendFn, ValueKind } from "./value-kind.js";

/** Clamp a fraction to [0, 1]. */
export function clamp01(t: number): number {
  return t < 0 ? 0 : t > 1 ? 1 : t;
}

/** Linear blend between two numbers, unclamped. */
export function lerpUnclamped(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Linear blend between two numbers with the fraction clamped to [0, 1]. */
export function lerp(a: number, b: number, t: number): number {
  return lerpUnclamped(a, b, clamp01(t));
}

/**
 * Stores one blend function per value kind.
 *
 * Resolution falls back to the kind's class: a static `lerp(a, b, t)` on it
 * is adopted and cached as if it had been registered. Values it returns
 * are checked against the kind.
 *
 * Not synchronised. The runtime is single-threaded; callers sharing a
 * registry across workers must coordinate registration themselves.
 */
export class InterpolatorRegistry {
  /**
   * Register the blend for a kind. Replaces any previous registration
   * (last write wins).
   */
  register<T>(kind: ValueKind<T>, blend: BlendFn<T>): void {
    kind.setBlend(this, blend);
  }

  /** Remove the registration for a kind. */
  unregister<T>(kind: ValueKind<T>): void {
    kind.setBlend(this, undefined);
  }

  /** Whether the kind has a registered (or already derived) blend. */
  has<T>(kind: ValueKind<T>): boolean {
    return kind.blendFor(this) !== undefined;
  }

  /**
   * Find the blend for a kind.
   *
   * @throws TweenError `UnsupportedValueKind` when nothing is registered and
   *   the kind's class has no static `lerp`.
   */
  resolve<T>(kind: ValueKind<T>): BlendFn<T> {
    const registered = kind.blendFor(this);
    if (registered) {
      return registered;
    }

    const type = kind.type;
    const lerpMethod = type?.lerp;
    if (type && typeof lerpMethod === "function") {
      const derived: BlendFn<T> = (a, b, t) => {
        const value: unknown = lerpMethod.call(type, a, b, t);
        if (!kind.is(value)) {
          throw new TweenError(
            "UnsupportedValueKind",
            `${type.name}.lerp returned a value that is not a ${kind.name}`,
          );
        }
        return value;
      };
      kind.setBlend(this, derived);
      return derived;
    }

    throw new TweenError(
      "UnsupportedValueKind",
      `No blend function for value kind "${kind.name}". ` +
        `Register one with register() or give its class a static lerp(a, b, t).`,
    );
  }
}

/** A registry pre-loaded with the number kinds. */
export function createDefaultRegistry(): InterpolatorRegistry {
  const registry = new InterpolatorRegistry();
  registry.register(FLOAT, lerp);
  registry.register(DOUBLE, lerpUnclamped);
  return registry;
}

/** The process-wide registry used unless a tweener is given its own. */
export const interpolators: InterpolatorRegistry = createDefaultRegistry();
