import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  TestClock,
  TweenHandle,
  TweenScheduler,
  Tweener,
  DOUBLE,
  linear,
} from "../src/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function linearTo10(tweener: Tweener, box: { x: number }): TweenHandle {
  return tweener.tween({
    kind: DOUBLE,
    set: (v) => {
      box.x = v;
    },
    from: 0,
    to: 10,
    duration: 1,
    easing: linear,
  });
}

// ---------------------------------------------------------------------------
// Test suite
// ---------------------------------------------------------------------------

describe("TweenScheduler", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // =========================================================================
  // Clock-driven loop
  // =========================================================================

  describe("with a clock", () => {
    it("advances tweens by the time between frames, in seconds", () => {
      const clock = new TestClock();
      const tweener = new Tweener({ clock });
      const box = { x: 0 };
      linearTo10(tweener, box);

      clock.advance(250);
      expect(box.x).toBe(2.5);

      clock.advanceFrames(3, 250);
      expect(box.x).toBe(10);
    });

    it("stops requesting frames once nothing is playing", () => {
      const clock = new TestClock();
      const tweener = new Tweener({ clock });
      linearTo10(tweener, { x: 0 });

      clock.advanceFrames(4, 250);
      expect(clock.pendingCount).toBe(1);

      clock.advance(250);
      expect(tweener.activeCount).toBe(0);
      expect(clock.pendingCount).toBe(0);
    });

    it("measures the first frame from when the loop starts", () => {
      const clock = new TestClock();
      const tweener = new Tweener({ clock });
      clock.advance(5000);
      const box = { x: 0 };
      linearTo10(tweener, box);

      clock.advance(500);

      expect(box.x).toBe(5);
    });

    it("applies the time scale", () => {
      const clock = new TestClock();
      const tweener = new Tweener({ clock, timeScale: 2 });
      const box = { x: 0 };
      linearTo10(tweener, box);

      clock.advance(250);

      expect(box.x).toBe(5);
    });

    it("dispose() stops everything and cancels the pending frame", () => {
      const clock = new TestClock();
      const tweener = new Tweener({ clock });
      const handle = linearTo10(tweener, { x: 0 });

      tweener.dispose();

      expect(handle.isActive).toBe(false);
      expect(clock.pendingCount).toBe(0);
    });
  });

  // =========================================================================
  // Manual stepping
  // =========================================================================

  describe("step()", () => {
    it("treats negative and non-finite deltas as zero", () => {
      const tweener = new Tweener();
      const box = { x: 0 };
      linearTo10(tweener, box);
      tweener.step(0.5);

      tweener.step(-1);
      expect(box.x).toBe(5);
      tweener.step(Number.NaN);
      expect(box.x).toBe(5);
    });

    it("advances a handle created during a step from the next step on", () => {
      const tweener = new Tweener();
      const a = { x: 0 };
      const b = { x: 0 };
      let spawned: TweenHandle | undefined;
      tweener.tween({
        kind: DOUBLE,
        set: (v) => {
          a.x = v;
          spawned ??= linearTo10(tweener, b);
        },
        from: 0,
        to: 10,
        duration: 1,
        easing: linear,
      });

      tweener.step(0.5);
      expect(b.x).toBe(0);
      expect(spawned?.isActive).toBe(true);

      tweener.step(0.5);
      expect(b.x).toBe(5);
    });

    it("skips a handle stopped earlier in the same step", () => {
      const tweener = new Tweener();
      const a = { x: 0 };
      const b = { x: 0 };
      let victim: TweenHandle | undefined;
      tweener.tween({
        kind: DOUBLE,
        set: (v) => {
          a.x = v;
          victim?.stop();
        },
        from: 0,
        to: 10,
        duration: 1,
        easing: linear,
      });
      victim = linearTo10(tweener, b);

      tweener.step(0.5);

      expect(a.x).toBe(5);
      expect(b.x).toBe(0);
      expect(tweener.activeCount).toBe(1);
    });

    it("drops a handle whose tree throws and keeps going", () => {
      const scheduler = new TweenScheduler();
      const broken = new TweenHandle(
        {
          advance: () => {
            throw new Error("boom");
          },
          reset: () => {},
          current: undefined,
        },
        scheduler,
      );

      expect(() => scheduler.step(0.1)).not.toThrow();
      expect(broken.isActive).toBe(false);
      expect(console.warn).toHaveBeenCalledWith(
        "[lerpline] tween handle failed and was removed: boom",
      );
    });

    it("stopAll() removes every handle", () => {
      const tweener = new Tweener();
      linearTo10(tweener, { x: 0 });
      linearTo10(tweener, { x: 0 });

      tweener.stopAll();

      expect(tweener.activeCount).toBe(0);
    });
  });
});
