import { describe, it, expect } from "vitest";
import {
  linear,
  quadraticIn,
  quadraticOut,
  quadraticInOut,
  quadraticBezier,
  cubicInOut,
  sinusoidalInOut,
  elasticIn,
  elasticOut,
  elasticInOut,
  backIn,
  backOut,
  bounceOut,
  getEasing,
  isEasingName,
  EASING_FUNCTIONS,
  EASING_NAMES,
  DEFAULT_EASING,
} from "../src/index.js";

describe("easing functions", () => {
  describe("linear", () => {
    it("returns input unchanged", () => {
      expect(linear(0)).toBe(0);
      expect(linear(0.5)).toBe(0.5);
      expect(linear(1)).toBe(1);
    });
  });

  describe("quadratic", () => {
    it("In starts slow", () => {
      // At t=0.5, quadraticIn(0.5) = 0.25, slower than linear
      expect(quadraticIn(0.5)).toBe(0.25);
    });

    it("Out starts fast", () => {
      expect(quadraticOut(0.5)).toBe(0.75);
    });

    it("InOut is symmetric around the midpoint", () => {
      expect(quadraticInOut(0.5)).toBe(0.5);
      expect(quadraticInOut(0.25)).toBeLessThan(0.25);
      expect(quadraticInOut(0.75)).toBeGreaterThan(0.75);
    });
  });

  describe("every built-in curve", () => {
    const names = EASING_NAMES.filter((name) => name !== "elasticInOut");

    it.each(names)("%s starts at 0 and ends at 1", (name) => {
      const easing = getEasing(name);
      expect(easing).toBeDefined();
      expect(easing?.(0)).toBeCloseTo(0, 10);
      expect(easing?.(1)).toBeCloseTo(1, 10);
    });

    it("elasticInOut lands within a hair of its endpoints", () => {
      expect(elasticInOut(0)).toBeCloseTo(0, 2);
      expect(elasticInOut(1)).toBeCloseTo(1, 2);
    });
  });

  describe("overshooting curves", () => {
    it("elastic and back leave [0, 1]", () => {
      expect(elasticOut(0.25)).toBeGreaterThan(1);
      expect(elasticIn(0.75)).toBeLessThan(0);
      expect(backIn(0.25)).toBeLessThan(0);
      expect(backOut(0.75)).toBeGreaterThan(1);
    });

    it("bounceOut stays within [0, 1]", () => {
      for (let i = 0; i <= 20; i++) {
        const v = bounceOut(i / 20);
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(1 + 1e-12);
      }
    });
  });

  describe("quadraticBezier", () => {
    it("matches quadraticIn and quadraticOut at the extreme controls", () => {
      expect(quadraticBezier(0)(0.5)).toBe(quadraticIn(0.5));
      expect(quadraticBezier(1)(0.5)).toBe(quadraticOut(0.5));
    });
  });

  it("cubicInOut passes through the midpoint", () => {
    expect(cubicInOut(0.5)).toBe(0.5);
  });
});

describe("easing registry", () => {
  it("looks up built-in names", () => {
    expect(getEasing("linear")).toBe(linear);
    expect(getEasing("sinusoidalInOut")).toBe(sinusoidalInOut);
  });

  it("returns undefined for unknown or inherited names", () => {
    expect(getEasing("nonexistent")).toBeUndefined();
    expect(getEasing("toString")).toBeUndefined();
    expect(isEasingName("constructor")).toBe(false);
  });

  it("lists every curve once", () => {
    expect(EASING_NAMES).toHaveLength(Object.keys(EASING_FUNCTIONS).length);
    expect(EASING_NAMES).toContain("bounceInOut");
  });

  it("defaults to sinusoidal ease-in-out", () => {
    expect(DEFAULT_EASING).toBe(sinusoidalInOut);
  });
});
