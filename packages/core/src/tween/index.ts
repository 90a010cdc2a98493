/**
 * @lerpline/core tween module — public API exports.
 */

// Facade
export { Tweener } from "./tweener.js";
export type { TweenerOptions, TweenOptions, PropertyTweenOptions } from "./tweener.js";

// State machines
export { RawTween } from "./raw-tween.js";
export type { RawTweenOptions, TweenPhase } from "./raw-tween.js";
export { LoopWrapper } from "./loop.js";
export { Chain } from "./chain.js";
export type { ChainSide } from "./chain.js";
export { Delay } from "./delay.js";
export { flipDirection, directionSign } from "./types.js";
export type {
  Advanceable,
  Getter,
  LoopType,
  PlayDirection,
  ResetMode,
  Setter,
} from "./types.js";

// Handles & scheduling
export { TweenHandle } from "./handle.js";
export type { TweenHost } from "./handle.js";
export { TweenScheduler } from "./scheduler.js";
export type { TweenSchedulerOptions } from "./scheduler.js";

// Clock
export type { Clock, CancelHandle } from "./clock.js";
export { BrowserClock } from "./browser-clock.js";
export { TimerClock } from "./timer-clock.js";
export type { TimerClockOptions } from "./timer-clock.js";

// Value kinds & interpolation
export { ValueKind, defineValueKind, valueKindOf, FLOAT, DOUBLE } from "./value-kind.js";
export type { BlendFn, ValueClass, LerpableClass } from "./value-kind.js";
export {
  InterpolatorRegistry,
  interpolators,
  createDefaultRegistry,
  lerp,
  lerpUnclamped,
  clamp01,
} from "./interpolation.js";
export { Vec2, Vec3, Vec4, Quat, Color, VEC2, VEC3, VEC4, QUAT, COLOR } from "./values.js";

// Property binding
export { bindProperty } from "./binding.js";
export type { PropertyBinding } from "./binding.js";

// Easing
export type { EasingFn, EasingName } from "./easing.js";
export {
  linear,
  quadraticIn,
  quadraticOut,
  quadraticInOut,
  quadraticBezier,
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
  getEasing,
  isEasingName,
  EASING_FUNCTIONS,
  EASING_NAMES,
  DEFAULT_EASING,
} from "./easing.js";

// Errors
export { TweenError, describeError } from "./errors.js";
export type { TweenErrorCode } from "./errors.js";

// Test utilities
export { TestClock } from "./test-clock.js";
