import { describe, it, expect } from "vitest";
import { bindProperty, TweenError, DOUBLE, VEC2, Vec2 } from "../src/index.js";
import type { TweenErrorCode } from "../src/index.js";

/** Run `fn` and return the code and message of the TweenError it throws. */
function failure(fn: () => unknown): { code: TweenErrorCode; message: string } | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TweenError) {
      return { code: error.code, message: error.message };
    }
    throw error;
  }
  return undefined;
}

class Sprite {
  private _alpha = 1;
  readonly id = "sprite-1";

  get alpha(): number {
    return this._alpha;
  }

  set alpha(value: number) {
    this._alpha = value;
  }

  get width(): number {
    return 32;
  }
}

describe("bindProperty", () => {
  it("reads and writes a plain data property", () => {
    const box = { x: 1 };
    const binding = bindProperty(box, "x", DOUBLE);

    expect(binding.get()).toBe(1);
    binding.set(4);
    expect(box.x).toBe(4);
  });

  it("goes through accessors inherited from the prototype", () => {
    const sprite = new Sprite();
    const binding = bindProperty(sprite, "alpha", DOUBLE);

    binding.set(0.5);

    expect(sprite.alpha).toBe(0.5);
    expect(binding.get()).toBe(0.5);
  });

  it("binds object-valued properties of the matching kind", () => {
    const node = { position: new Vec2(1, 2) };
    const binding = bindProperty(node, "position", VEC2);

    binding.set(new Vec2(3, 4));

    expect(node.position).toEqual(new Vec2(3, 4));
  });

  it("rejects a missing property", () => {
    expect(failure(() => bindProperty({ x: 1 }, "y", DOUBLE))).toEqual({
      code: "NoSuchProperty",
      message: 'target has no property named "y"',
    });
  });

  it("rejects a getter without a setter", () => {
    expect(failure(() => bindProperty(new Sprite(), "width", DOUBLE))).toEqual({
      code: "NoSuchProperty",
      message: 'property "width" is read-only',
    });
  });

  it("rejects a non-writable data property", () => {
    const frozen = Object.freeze({ x: 1 });

    expect(failure(() => bindProperty(frozen, "x", DOUBLE))?.code).toBe("NoSuchProperty");
  });

  it("rejects a property holding another kind of value", () => {
    expect(failure(() => bindProperty({ label: "hello" }, "label", DOUBLE))).toEqual({
      code: "UnsupportedValueKind",
      message: 'property "label" holds a string, not a double value',
    });
  });

  it("names the class of a mismatched object value", () => {
    const sprite = new Sprite();

    expect(failure(() => bindProperty({ sprite }, "sprite", VEC2))?.message).toBe(
      'property "sprite" holds a Sprite, not a Vec2 value',
    );
  });

  it("rejects a non-object target", () => {
    // Untyped callers can pass anything.
    const call = () => Reflect.apply(bindProperty, undefined, [42, "x", DOUBLE]);

    expect(failure(call)).toEqual({
      code: "InvalidArgument",
      message: 'target for property "x" is not an object',
    });
  });

  it("fails on read when the property changed kind after binding", () => {
    const bag: Record<string, unknown> = { x: 1 };
    const binding = bindProperty(bag, "x", DOUBLE);

    bag.x = "oops";

    expect(failure(() => binding.get())).toEqual({
      code: "UnsupportedValueKind",
      message: 'property "x" now holds a string, not a double value',
    });
  });
});
