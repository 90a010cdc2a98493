/**
 * RawTween — the atomic, bidirectional tween state machine.
 *
 * Owns one interpolation from a start value to a target value. Time is
 * integrated forward or backward by the deltas it is driven with, clamped
 * to [0, duration]. The phase records which boundary the playhead rests on,
 * which decides whether a step produces a value and when the tween reports
 * that it cannot move further.
 */

import { DEFAULT_EASING } from "./easing.js";
import type { EasingFn } from "./easing.js";
import { TweenError, describeError } from "./errors.js";
import { interpolators } from "./interpolation.js";
import type { InterpolatorRegistry } from "./interpolation.js";
import { warn } from "./log.js";
import { directionSign } from "./types.js";
import type {
  Advanceable,
  Getter,
  PlayDirection,
  ResetMode,
  Setter,
} from "./types.js";
import { ValueKind } from "./value-kind.js";
import type { BlendFn } from "./value-kind.js";

/** Options for a single tween. */
export interface RawTweenOptions<T> {
  /** Kind of the animated value. Selects the blend function. */
  readonly kind: ValueKind<T>;
  /** Receives each interpolated value. */
  readonly set: Setter<T>;
  /** Value reached at the end of the tween. */
  readonly to: T;
  /**
   * Value the tween starts from. When omitted, `get` is called at each
   * (re)start, so the tween animates from whatever the value is then.
   */
  readonly from?: T;
  /**
   * Reads the animated value. Used as the start value when `from` is
   * omitted, and always used to capture the pre-animation value that is
   * restored when the tween is played back past its start.
   */
  readonly get?: Getter<T>;
  /** Duration in seconds. Must be finite and greater than 0. */
  readonly duration: number;
  /** Easing curve. Defaults to sinusoidal ease-in-out. */
  readonly easing?: EasingFn;
  /** Name used in warnings. Defaults to the kind's name. */
  readonly label?: string;
}

/**
 * Where the playhead rests.
 *
 * `resetting` means a reset was requested and will be applied by the next
 * `advance`.
 */
export type TweenPhase = "leftEnd" | "running" | "rightEnd" | "resetting";

interface TweenConfig<T> {
  readonly set: Setter<T>;
  readonly get: Getter<T> | undefined;
  readonly from: T | undefined;
  readonly to: T;
  readonly duration: number;
  readonly easing: EasingFn;
  readonly blend: BlendFn<T>;
}

interface CapturedValues<T> {
  /** Start of the interpolation. */
  readonly from: T;
  /** Value restored when the playhead returns to 0. */
  readonly original: T;
}

interface PendingReset {
  readonly direction: PlayDirection;
  readonly mode: ResetMode;
}

/** Relative distance to a boundary under which the playhead snaps onto it. */
const SNAP_TOLERANCE = 1e-9;

/**
 * A single tween over one value.
 *
 * Invalid options do not throw: the tween logs a warning and stays inert,
 * reporting that it cannot advance in either direction.
 *
 * @example
 * ```ts
 * let x = 0;
 * const tween = new RawTween({
 *   kind: DOUBLE,
 *   set: (v) => { x = v; },
 *   from: 0,
 *   to: 10,
 *   duration: 1,
 *   easing: linear,
 * });
 * tween.advance("forward", 0.5); // x === 5
 * ```
 */
export class RawTween<T> implements Advanceable {
  private config: TweenConfig<T> | null;
  private readonly label: string;
  private phase: Exclude<TweenPhase, "resetting"> = "leftEnd";
  private pendingReset: PendingReset | null = null;
  private captured: CapturedValues<T> | null = null;
  private elapsed = 0;
  private lastValue: T | undefined = undefined;

  constructor(options: RawTweenOptions<T>, registry: InterpolatorRegistry = interpolators) {
    this.label = options.label ?? describeKind(options.kind);
    try {
      this.config = prepare(options, registry);
    } catch (error) {
      warn(`${this.label}: ${describeError(error)}. Will not tween.`);
      this.config = null;
    }
  }

  /** Current phase of the state machine. */
  get state(): TweenPhase {
    return this.pendingReset && this.config ? "resetting" : this.phase;
  }

  /** Elapsed time in seconds, in [0, duration]. */
  get elapsedTime(): number {
    return this.elapsed;
  }

  /** Duration in seconds, or 0 for an inert tween. */
  get duration(): number {
    return this.config?.duration ?? 0;
  }

  /** Whether the tween was rejected at construction or failed while running. */
  get isInert(): boolean {
    return this.config === null;
  }

  /** Last value delivered to the setter. */
  get current(): T | undefined {
    return this.lastValue;
  }

  advance(direction: PlayDirection, delta: number): boolean {
    const config = this.config;
    if (!config) {
      return false;
    }
    if (
      !this.pendingReset &&
      ((this.phase === "rightEnd" && direction === "forward") ||
        (this.phase === "leftEnd" && direction === "reverse"))
    ) {
      return false;
    }

    try {
      this.step(config, direction, delta);
      return true;
    } catch (error) {
      this.config = null;
      warn(`${this.label} stopped: ${describeError(error)}`);
      return false;
    }
  }

  reset(direction: PlayDirection, mode: ResetMode = "restart"): void {
    if (!this.config) {
      return;
    }
    // A pending restart must still re-read its sources, even if a rewind follows.
    const keepRestart = this.pendingReset?.mode === "restart";
    this.pendingReset = { direction, mode: keepRestart ? "restart" : mode };
  }

  // ---------------------------------------------------------------------------
  // Stepping
  // ---------------------------------------------------------------------------

  private step(config: TweenConfig<T>, direction: PlayDirection, delta: number): void {
    const pending = this.pendingReset;
    if (pending) {
      this.pendingReset = null;
      if (pending.mode === "restart" || !this.captured) {
        this.captured = capture(config);
      }
      if (pending.direction === "forward") {
        this.elapsed = 0;
        this.phase = "leftEnd";
      } else {
        this.elapsed = config.duration;
        this.phase = "rightEnd";
      }
    }
    const captured = this.captured ?? this.recapture(config);

    this.elapsed = integrate(this.elapsed, directionSign(direction) * delta, config.duration);
    const t = this.elapsed / config.duration;

    if (
      this.phase === "running" ||
      (this.phase === "leftEnd" && t > 0) ||
      (this.phase === "rightEnd" && t < 1)
    ) {
      this.deliver(config, config.blend(captured.from, config.to, config.easing(t)));
      this.phase = "running";
    }

    if (t >= 1) {
      this.phase = "rightEnd";
    } else if (t <= 0) {
      this.phase = "leftEnd";
      this.deliver(config, captured.original);
    }
  }

  private recapture(config: TweenConfig<T>): CapturedValues<T> {
    const captured = capture(config);
    this.captured = captured;
    return captured;
  }

  private deliver(config: TweenConfig<T>, value: T): void {
    this.lastValue = value;
    config.set(value);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Validate options and resolve the blend.
 *
 * @throws TweenError describing the first problem found.
 */
function prepare<T>(
  options: RawTweenOptions<T>,
  registry: InterpolatorRegistry,
): TweenConfig<T> {
  const { kind, set, get, from, to, duration } = options;
  const easing = options.easing ?? DEFAULT_EASING;

  if (!(kind instanceof ValueKind)) {
    throw new TweenError("InvalidArgument", "kind must be a ValueKind");
  }
  if (typeof set !== "function") {
    throw new TweenError("InvalidArgument", "set is not a function");
  }
  if (get !== undefined && typeof get !== "function") {
    throw new TweenError("InvalidArgument", "get was provided but is not a function");
  }
  if (from === undefined && get === undefined) {
    throw new TweenError(
      "InvalidArgument",
      `from must be a ${kind.name} value, or a get function must be provided`,
    );
  }
  if (from !== undefined && !kind.is(from)) {
    throw new TweenError("InvalidArgument", `from is not a ${kind.name} value`);
  }
  if (!kind.is(to)) {
    throw new TweenError("InvalidArgument", `to is not a ${kind.name} value`);
  }
  if (typeof duration !== "number" || !Number.isFinite(duration) || duration <= 0) {
    throw new TweenError(
      "InvalidArgument",
      `duration must be a finite number of seconds greater than 0 (got ${String(duration)})`,
    );
  }
  if (typeof easing !== "function") {
    throw new TweenError("InvalidArgument", "easing is not a function");
  }

  return {
    set,
    get,
    from,
    to,
    duration,
    easing,
    blend: registry.resolve(kind),
  };
}

/** Read the start and original values for a new pass. */
function capture<T>(config: TweenConfig<T>): CapturedValues<T> {
  const { get } = config;
  if (config.from !== undefined) {
    return { from: config.from, original: get ? get() : config.from };
  }
  if (!get) {
    // prepare() guarantees one of the two sources.
    throw new TweenError("InvalidArgument", "tween has no start value source");
  }
  const from = get();
  return { from, original: from };
}

/** Move the playhead and clamp it, snapping onto a boundary within tolerance. */
function integrate(elapsed: number, delta: number, duration: number): number {
  const next = Math.min(Math.max(elapsed + delta, 0), duration);
  const tolerance = duration * SNAP_TOLERANCE;
  if (duration - next <= tolerance) {
    return duration;
  }
  if (next <= tolerance) {
    return 0;
  }
  return next;
}

function describeKind(kind: unknown): string {
  return kind instanceof ValueKind ? `${kind.name} tween` : "tween";
}
