/**
 * @lerpline/sequence — Declarative tween sequences.
 *
 * Validates plain-data sequence definitions with zod and plays them on a
 * target object through a `Tweener` from @lerpline/core.
 */

export {
  tweenSequenceSchema,
  sequenceStepSchema,
  propertyStepSchema,
  delayStepSchema,
  loopTypeSchema,
  easingNameSchema,
  parseTweenSequence,
  isDelayStep,
} from "./sequence-schema.js";
export type {
  TweenSequence,
  TweenSequenceInput,
  SequenceStep,
  PropertyStep,
  DelayStep,
} from "./sequence-schema.js";
export { playSequence } from "./play-sequence.js";
