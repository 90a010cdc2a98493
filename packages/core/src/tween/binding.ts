/**
 * Property binding — turns "this property on that object" into the
 * getter/setter pair a tween consumes.
 *
 * The name is resolved and checked once, when the binding is created; the
 * tween itself only ever sees the getter and setter.
 */

import { TweenError } from "./errors.js";
import type { Getter, Setter } from "./types.js";
import type { ValueKind } from "./value-kind.js";

/** Getter and setter for one property of one object. */
export interface PropertyBinding<T> {
  readonly get: Getter<T>;
  readonly set: Setter<T>;
}

/**
 * Bind a named property of `target`.
 *
 * @throws TweenError
 * - `InvalidArgument` when `target` is not an object,
 * - `NoSuchProperty` when the property does not exist or cannot be assigned,
 * - `UnsupportedValueKind` when its current value is not of `kind`.
 *
 * @example
 * ```ts
 * const box = { opacity: 1 };
 * const { get, set } = bindProperty(box, "opacity", DOUBLE);
 * set(0.5); // box.opacity === 0.5
 * ```
 */
export function bindProperty<T>(
  target: object,
  name: string,
  kind: ValueKind<T>,
): PropertyBinding<T> {
  if (!isObjectLike(target)) {
    throw new TweenError("InvalidArgument", `target for property "${name}" is not an object`);
  }
  if (!(name in target)) {
    throw new TweenError("NoSuchProperty", `target has no property named "${name}"`);
  }
  if (!isAssignable(target, name)) {
    throw new TweenError("NoSuchProperty", `property "${name}" is read-only`);
  }
  const current: unknown = Reflect.get(target, name);
  if (!kind.is(current)) {
    throw new TweenError(
      "UnsupportedValueKind",
      `property "${name}" holds ${describeValue(current)}, not a ${kind.name} value`,
    );
  }

  return {
    get: () => {
      const value: unknown = Reflect.get(target, name);
      if (!kind.is(value)) {
        throw new TweenError(
          "UnsupportedValueKind",
          `property "${name}" now holds ${describeValue(value)}, not a ${kind.name} value`,
        );
      }
      return value;
    },
    set: (value) => {
      if (!Reflect.set(target, name, value)) {
        throw new TweenError("NoSuchProperty", `property "${name}" could not be assigned`);
      }
    },
  };
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

/** Look up the descriptor along the prototype chain and check it can be written. */
function isAssignable(target: object, name: string): boolean {
  let node: object | null = target;
  while (node) {
    const descriptor = Object.getOwnPropertyDescriptor(node, name);
    if (descriptor) {
      if ("value" in descriptor) {
        return descriptor.writable === true && (node === target || Object.isExtensible(target));
      }
      return descriptor.set !== undefined;
    }
    node = Object.getPrototypeOf(node);
  }
  return false;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    const name: unknown = value.constructor?.name;
    return typeof name === "string" && name !== "" ? `a ${name}` : "an object";
  }
  return `a ${typeof value}`;
}
