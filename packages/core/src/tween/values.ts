/**
 * Built-in value classes.
 *
 * Immutable vectors, a quaternion and an RGBA colour. Each has a static
 * `lerp`, so their kinds resolve through the registry's convention lookup
 * without being registered.
 */

import { clamp01, lerpUnclamped } from "./interpolation.js";
import { valueKindOf } from "./value-kind.js";
import type { ValueKind } from "./value-kind.js";

export class Vec2 {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  static lerp(a: Vec2, b: Vec2, t: number): Vec2 {
    const k = clamp01(t);
    return new Vec2(lerpUnclamped(a.x, b.x, k), lerpUnclamped(a.y, b.y, k));
  }
}

export class Vec3 {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
  ) {}

  static lerp(a: Vec3, b: Vec3, t: number): Vec3 {
    const k = clamp01(t);
    return new Vec3(
      lerpUnclamped(a.x, b.x, k),
      lerpUnclamped(a.y, b.y, k),
      lerpUnclamped(a.z, b.z, k),
    );
  }
}

export class Vec4 {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
    readonly w: number,
  ) {}

  static lerp(a: Vec4, b: Vec4, t: number): Vec4 {
    const k = clamp01(t);
    return new Vec4(
      lerpUnclamped(a.x, b.x, k),
      lerpUnclamped(a.y, b.y, k),
      lerpUnclamped(a.z, b.z, k),
      lerpUnclamped(a.w, b.w, k),
    );
  }
}

/** Rotation quaternion (x, y, z, w). */
export class Quat {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
    readonly w: number,
  ) {}

  static readonly identity = new Quat(0, 0, 0, 1);

  /**
   * Normalised lerp along the shorter arc, fraction clamped to [0, 1].
   * Cheaper than slerp and indistinguishable at animation step sizes.
   */
  static lerp(a: Quat, b: Quat, t: number): Quat {
    const k = clamp01(t);
    const dot = a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
    const s = dot < 0 ? -1 : 1;
    const x = lerpUnclamped(a.x, b.x * s, k);
    const y = lerpUnclamped(a.y, b.y * s, k);
    const z = lerpUnclamped(a.z, b.z * s, k);
    const w = lerpUnclamped(a.w, b.w * s, k);
    const length = Math.hypot(x, y, z, w);
    if (length === 0) {
      return Quat.identity;
    }
    return new Quat(x / length, y / length, z / length, w / length);
  }
}

/** RGBA colour with channels in [0, 1]. */
export class Color {
  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
    readonly a = 1,
  ) {}

  static lerp(from: Color, to: Color, t: number): Color {
    const k = clamp01(t);
    return new Color(
      lerpUnclamped(from.r, to.r, k),
      lerpUnclamped(from.g, to.g, k),
      lerpUnclamped(from.b, to.b, k),
      lerpUnclamped(from.a, to.a, k),
    );
  }
}

export const VEC2: ValueKind<Vec2> = valueKindOf(Vec2);
export const VEC3: ValueKind<Vec3> = valueKindOf(Vec3);
export const VEC4: ValueKind<Vec4> = valueKindOf(Vec4);
export const QUAT: ValueKind<Quat> = valueKindOf(Quat);
export const COLOR: ValueKind<Color> = valueKindOf(Color);
