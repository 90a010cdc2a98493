/**
 * Value kinds — runtime tags for the kinds of values a tween can blend.
 *
 * TypeScript types vanish at run time, so every tween names the kind of
 * value it animates with a {@link ValueKind} token. The token is the key the
 * interpolator registry uses to find the blend function, and its guard is
 * what property binding uses to check a property holds the right kind.
 */

/**
 * Combines two values of the same kind with a fraction.
 *
 * @param a - Value at fraction 0.
 * @param b - Value at fraction 1.
 * @param t - Blend fraction. Easing curves may push it outside [0, 1];
 *   each blend decides whether to clamp or extrapolate.
 */
export type BlendFn<T> = (a: T, b: T, t: number) => T;

/** A class whose instances are values of kind `T`. */
export type ValueClass<T> = abstract new (...args: never[]) => T;

/** A value class that may carry a conventional static `lerp`. */
export type LerpableClass<T> = ValueClass<T> & { readonly lerp?: BlendFn<T> };

/**
 * Identifies one kind of value.
 *
 * Identity is by token: two kinds with the same `name` are still distinct.
 * Blend registrations are stored on the token itself, keyed by registry,
 * which keeps each lookup typed without a central heterogeneous map.
 */
export class ValueKind<T> {
  /** Diagnostic name, used in warnings. */
  readonly name: string;
  /** Class whose static `lerp` can supply a blend by convention. */
  readonly type: LerpableClass<T> | undefined;
  private readonly guard: (value: unknown) => value is T;
  private readonly blends = new WeakMap<object, BlendFn<T>>();

  constructor(
    name: string,
    guard: (value: unknown) => value is T,
    type?: LerpableClass<T>,
  ) {
    this.name = name;
    this.guard = guard;
    this.type = type;
  }

  /** Whether `value` is of this kind. */
  is(value: unknown): value is T {
    return this.guard(value);
  }

  /** @internal Blend stored for `owner`, if any. */
  blendFor(owner: object): BlendFn<T> | undefined {
    return this.blends.get(owner);
  }

  /** @internal Store or clear the blend for `owner`. */
  setBlend(owner: object, blend: BlendFn<T> | undefined): void {
    if (blend) {
      this.blends.set(owner, blend);
    } else {
      this.blends.delete(owner);
    }
  }
}

/**
 * Define a value kind from a runtime guard.
 *
 * @example
 * ```ts
 * type Rect = { x: number; y: number; w: number; h: number };
 * const RECT = defineValueKind("rect", (v): v is Rect =>
 *   typeof v === "object" && v !== null && "w" in v && "h" in v);
 * interpolators.register(RECT, (a, b, t) => ({ ... }));
 * ```
 */
export function defineValueKind<T>(
  name: string,
  guard: (value: unknown) => value is T,
): ValueKind<T> {
  return new ValueKind(name, guard);
}

/**
 * Define a value kind for instances of a class.
 *
 * If the class has a static `lerp(a, b, t)`, the registry picks it up on
 * first use without an explicit registration.
 */
export function valueKindOf<T>(type: LerpableClass<T>): ValueKind<T> {
  return new ValueKind(
    type.name,
    (value: unknown): value is T => value instanceof type,
    type,
  );
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

/** Plain numbers, blended with the fraction clamped to [0, 1]. */
export const FLOAT: ValueKind<number> = defineValueKind("float", isNumber);

/** Plain numbers, blended without clamping (overshooting curves extrapolate). */
export const DOUBLE: ValueKind<number> = defineValueKind("double", isNumber);
