/**
 * playSequence — turns a declarative sequence into a chained tween handle.
 */

import {
  DOUBLE,
  EASING_FUNCTIONS,
  FLOAT,
  TweenHandle,
  bindProperty,
  describeError,
} from "@lerpline/core";
import type { PropertyBinding, Tweener } from "@lerpline/core";
import { warn } from "./log.js";
import { isDelayStep, parseTweenSequence } from "./sequence-schema.js";
import type { PropertyStep, TweenSequence } from "./sequence-schema.js";

/**
 * Play a sequence definition on `target`.
 *
 * Steps run in order as one chain; the sequence's `loop` applies to the
 * chain as a whole. An invalid definition is reported as a warning and
 * yields an inert handle. A property step whose property cannot be bound
 * is skipped with a warning.
 *
 * @example
 * ```ts
 * const handle = playSequence(tweener, sprite, {
 *   loop: "pingPong",
 *   steps: [
 *     { property: "alpha", to: 0, duration: 0.3, easing: "quadraticOut" },
 *     { delay: 0.2 },
 *     { property: "alpha", to: 1, duration: 0.3 },
 *   ],
 * });
 * ```
 */
export function playSequence(tweener: Tweener, target: object, definition: unknown): TweenHandle {
  let sequence: TweenSequence;
  try {
    sequence = parseTweenSequence(definition);
  } catch (error) {
    warn(`${describeError(error)}. Will not play.`);
    return TweenHandle.inert(tweener.scheduler);
  }

  const handles = sequence.steps.map((step) =>
    isDelayStep(step) ? tweener.delay(step.delay) : propertyHandle(tweener, target, step),
  );
  const root = handles.reduce((chain, next) => chain.then(next));
  root.loop = sequence.loop;
  return root;
}

function propertyHandle(tweener: Tweener, target: object, step: PropertyStep): TweenHandle {
  const kind = step.kind === "float" ? FLOAT : DOUBLE;
  let binding: PropertyBinding<number>;
  try {
    binding = bindProperty(target, step.property, kind);
  } catch (error) {
    warn(`property "${step.property}": ${describeError(error)}. Step skipped.`);
    return TweenHandle.inert(tweener.scheduler);
  }

  return tweener.tween({
    kind,
    get: binding.get,
    set: binding.set,
    from: step.from,
    to: step.to,
    duration: step.duration,
    easing: step.easing === undefined ? undefined : EASING_FUNCTIONS[step.easing],
    loop: step.loop,
    label: `property "${step.property}"`,
  });
}
