/**
 * Easing curves.
 *
 * An easing function maps raw progress t ∈ [0, 1] to an eased fraction.
 * The output is not bounded: elastic and back curves overshoot, and the
 * value kind's blend decides whether to clamp or extrapolate.
 *
 * Curves after Robert Penner's easing equations.
 */

/**
 * A pure function that maps linear progress to eased progress.
 *
 * @param t - Raw progress in [0, 1] where 0 = start, 1 = end.
 */
export type EasingFn = (t: number) => number;

const HALF_PI = Math.PI / 2;
const ELASTIC_PERIOD = 0.4;
const BACK_OVERSHOOT = 1.70158;
const BACK_OVERSHOOT_IN_OUT = BACK_OVERSHOOT * 1.525;

/** Constant speed. */
export function linear(t: number): number {
  return t;
}

export function quadraticIn(t: number): number {
  return t * t;
}

export function quadraticOut(t: number): number {
  return t * (2 - t);
}

export function quadraticInOut(t: number): number {
  const k = t * 2;
  if (k < 1) return 0.5 * k * k;
  const m = k - 1;
  return -0.5 * (m * (m - 2) - 1);
}

/**
 * Quadratic Bézier easing with one control value.
 * `quadraticBezier(0)` behaves like {@link quadraticIn},
 * `quadraticBezier(1)` like {@link quadraticOut}.
 */
export function quadraticBezier(control: number): EasingFn {
  return (t) => control * 2 * t * (1 - t) + t * t;
}

export function cubicIn(t: number): number {
  return t * t * t;
}

export function cubicOut(t: number): number {
  const m = t - 1;
  return 1 + m * m * m;
}

export function cubicInOut(t: number): number {
  const k = t * 2;
  if (k < 1) return 0.5 * k * k * k;
  const m = k - 2;
  return 0.5 * (m * m * m + 2);
}

export function quarticIn(t: number): number {
  return t * t * t * t;
}

export function quarticOut(t: number): number {
  const m = t - 1;
  return 1 - m * m * m * m;
}

export function quarticInOut(t: number): number {
  const k = t * 2;
  if (k < 1) return 0.5 * k * k * k * k;
  const m = k - 2;
  return -0.5 * (m * m * m * m - 2);
}

export function quinticIn(t: number): number {
  return t * t * t * t * t;
}

export function quinticOut(t: number): number {
  const m = t - 1;
  return 1 + m * m * m * m * m;
}

export function quinticInOut(t: number): number {
  const k = t * 2;
  if (k < 1) return 0.5 * k * k * k * k * k;
  const m = k - 2;
  return 0.5 * (m * m * m * m * m + 2);
}

export function sinusoidalIn(t: number): number {
  return 1 - Math.cos(t * HALF_PI);
}

export function sinusoidalOut(t: number): number {
  return Math.sin(t * HALF_PI);
}

/** Smooth S-curve. The default easing for every tween. */
export function sinusoidalInOut(t: number): number {
  return 0.5 * (1 - Math.cos(Math.PI * t));
}

export function exponentialIn(t: number): number {
  return t === 0 ? 0 : 1024 ** (t - 1);
}

export function exponentialOut(t: number): number {
  return t === 1 ? 1 : 1 - 2 ** (-10 * t);
}

export function exponentialInOut(t: number): number {
  if (t === 0) return 0;
  if (t === 1) return 1;
  const k = t * 2;
  if (k < 1) return 0.5 * 1024 ** (k - 1);
  return 0.5 * (2 - 2 ** (-10 * (k - 1)));
}

export function circularIn(t: number): number {
  return 1 - Math.sqrt(1 - t * t);
}

export function circularOut(t: number): number {
  const m = t - 1;
  return Math.sqrt(1 - m * m);
}

export function circularInOut(t: number): number {
  const k = t * 2;
  if (k < 1) return -0.5 * (Math.sqrt(1 - k * k) - 1);
  const m = k - 2;
  return 0.5 * (Math.sqrt(1 - m * m) + 1);
}

function elasticWave(k: number): number {
  return Math.sin(((k - 0.1) * (2 * Math.PI)) / ELASTIC_PERIOD);
}

/** Overshoots below 0 before settling. */
export function elasticIn(t: number): number {
  if (t === 0) return 0;
  if (t === 1) return 1;
  const m = t - 1;
  return -(2 ** (10 * m)) * elasticWave(m);
}

/** Overshoots above 1 before settling. */
export function elasticOut(t: number): number {
  if (t === 0) return 0;
  if (t === 1) return 1;
  return 2 ** (-10 * t) * elasticWave(t) + 1;
}

export function elasticInOut(t: number): number {
  const m = t * 2 - 1;
  if (m < 0) return -0.5 * 2 ** (10 * m) * elasticWave(m);
  return 2 ** (-10 * m) * elasticWave(m) * 0.5 + 1;
}

export function backIn(t: number): number {
  const s = BACK_OVERSHOOT;
  return t * t * ((s + 1) * t - s);
}

export function backOut(t: number): number {
  const s = BACK_OVERSHOOT;
  const m = t - 1;
  return m * m * ((s + 1) * m + s) + 1;
}

export function backInOut(t: number): number {
  const s = BACK_OVERSHOOT_IN_OUT;
  const k = t * 2;
  if (k < 1) return 0.5 * (k * k * ((s + 1) * k - s));
  const m = k - 2;
  return 0.5 * (m * m * ((s + 1) * m + s) + 2);
}

export function bounceOut(t: number): number {
  if (t < 1 / 2.75) {
    return 7.5625 * t * t;
  }
  if (t < 2 / 2.75) {
    const m = t - 1.5 / 2.75;
    return 7.5625 * m * m + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const m = t - 2.25 / 2.75;
    return 7.5625 * m * m + 0.9375;
  }
  const m = t - 2.625 / 2.75;
  return 7.5625 * m * m + 0.984375;
}

export function bounceIn(t: number): number {
  return 1 - bounceOut(1 - t);
}

export function bounceInOut(t: number): number {
  if (t < 0.5) return bounceIn(t * 2) * 0.5;
  return bounceOut(t * 2 - 1) * 0.5 + 0.5;
}

/** Registry of built-in easing functions, keyed by name. */
export const EASING_FUNCTIONS = {
  linear,
  quadraticIn,
  quadraticOut,
  quadraticInOut,
  cubicIn,
  cubicOut,
  cubicInOut,
  quarticIn,
  quarticOut,
  quarticInOut,
  quinticIn,
  quinticOut,
  quinticInOut,
  sinusoidalIn,
  sinusoidalOut,
  sinusoidalInOut,
  exponentialIn,
  exponentialOut,
  exponentialInOut,
  circularIn,
  circularOut,
  circularInOut,
  elasticIn,
  elasticOut,
  elasticInOut,
  backIn,
  backOut,
  backInOut,
  bounceIn,
  bounceOut,
  bounceInOut,
} as const satisfies Readonly<Record<string, EasingFn>>;

/** Name of a built-in easing function. */
export type EasingName = keyof typeof EASING_FUNCTIONS;

/** Names of every built-in easing, in declaration order. */
export const EASING_NAMES: readonly string[] = Object.keys(EASING_FUNCTIONS);

/** Whether `name` is a built-in easing name. */
export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_FUNCTIONS, name);
}

/**
 * Look up an easing function by name.
 * Returns `undefined` if the name is not a built-in easing.
 */
export function getEasing(name: string): EasingFn | undefined {
  return isEasingName(name) ? EASING_FUNCTIONS[name] : undefined;
}

/** The easing used when a tween does not name one. */
export const DEFAULT_EASING: EasingFn = sinusoidalInOut;
