import { readFileSync } from "node:fs";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Tweener } from "@lerpline/core";
import { playSequence } from "../src/index.js";

function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8"));
}

describe("playSequence", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("plays steps in order as one handle", () => {
    const tweener = new Tweener();
    const target = { opacity: 1, x: 0 };

    const handle = playSequence(tweener, target, {
      steps: [
        { property: "opacity", to: 0, duration: 0.5, easing: "linear" },
        { delay: 0.25 },
        { property: "x", from: 10, to: 20, duration: 1, easing: "linear" },
      ],
    });

    expect(tweener.activeCount).toBe(1);
    tweener.step(0.25);
    expect(target.opacity).toBe(0.5);
    tweener.step(0.25);
    expect(target.opacity).toBe(0);
    tweener.step(0.25);
    expect(target.x).toBe(0);
    tweener.step(0.5);
    expect(target.x).toBe(15);
    expect(handle.isActive).toBe(true);
  });

  it("loops the whole sequence", () => {
    const tweener = new Tweener();
    const target = { opacity: 1 };

    const handle = playSequence(tweener, target, {
      loop: "repeat",
      steps: [{ property: "opacity", to: 0, duration: 0.5, easing: "linear" }],
    });
    tweener.step(0.25);
    tweener.step(0.25);
    tweener.step(0.25);

    expect(handle.loop).toBe("repeat");
    expect(target.opacity).toBe(0.5);
  });

  it("plays a sequence loaded from JSON", () => {
    const tweener = new Tweener();
    const target = { alpha: 1, scale: 1 };

    playSequence(tweener, target, loadFixture("fade-and-grow.json"));
    const frames: Array<[number, number]> = [];
    for (let i = 0; i < 9; i++) {
      tweener.step(0.25);
      frames.push([target.alpha, target.scale]);
    }

    expect(frames).toEqual([
      [0.5, 1],
      [0, 1],
      [0, 1],
      [0, 1.5],
      [0, 2],
      [0, 1.5],
      [0, 1],
      [0, 1],
      [0.5, 1],
    ]);
  });

  it("gives an inert handle for an invalid definition", () => {
    const tweener = new Tweener();

    const handle = playSequence(tweener, { x: 0 }, { steps: [] });

    expect(console.warn).toHaveBeenCalledWith(
      "[lerpline:sequence] InvalidArgument: invalid tween sequence: steps: Array must contain at least 1 element(s). Will not play.",
    );
    tweener.step(0.1);
    expect(handle.isActive).toBe(false);
  });

  it("skips a step whose property cannot be bound", () => {
    const tweener = new Tweener();
    const target = { x: 0 };

    playSequence(tweener, target, {
      steps: [
        { property: "nope", to: 1, duration: 1 },
        { property: "x", to: 10, duration: 1, easing: "linear" },
      ],
    });
    tweener.step(0.5);

    expect(console.warn).toHaveBeenCalledWith(
      '[lerpline:sequence] property "nope": NoSuchProperty: target has no property named "nope". Step skipped.',
    );
    expect(target.x).toBe(5);
  });
});
