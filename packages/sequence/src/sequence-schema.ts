/**
 * Sequence schema — zod definition of a declarative tween sequence.
 *
 * A sequence is plain data (typically JSON): an ordered list of property
 * tweens and delays, played one after the other on a single target object,
 * optionally looped as a whole.
 */

import { z } from "zod";
import { TweenError, isEasingName } from "@lerpline/core";

export const loopTypeSchema = z
  .enum(["none", "repeat", "reflect", "pingPong"])
  .describe("What happens when the end is reached.");

export const easingNameSchema = z
  .string()
  .refine(isEasingName, (name) => ({ message: `Unknown easing "${name}"` }))
  .describe("Name of a built-in easing curve, e.g. 'linear' or 'bounceOut'.");

export const propertyStepSchema = z
  .object({
    property: z
      .string()
      .min(1)
      .describe("Name of the numeric property on the target to animate."),
    to: z.number().finite().describe("Value reached at the end of the step."),
    from: z
      .number()
      .finite()
      .optional()
      .describe("Start value. Defaults to the property's value when the step starts."),
    duration: z.number().finite().positive().describe("Step duration in seconds."),
    easing: easingNameSchema.optional(),
    loop: loopTypeSchema.optional(),
    kind: z
      .enum(["float", "double"])
      .default("double")
      .describe("'float' clamps overshooting curves, 'double' lets them extrapolate."),
  })
  .strict();

export const delayStepSchema = z
  .object({
    delay: z.number().finite().positive().describe("Pause in seconds."),
  })
  .strict();

export const sequenceStepSchema = z.union([propertyStepSchema, delayStepSchema]);

export const tweenSequenceSchema = z.object({
  loop: loopTypeSchema.default("none"),
  steps: z.array(sequenceStepSchema).min(1),
});

/** A sequence as written by hand or in JSON (defaults not yet applied). */
export type TweenSequenceInput = z.input<typeof tweenSequenceSchema>;
/** A validated sequence with defaults applied. */
export type TweenSequence = z.infer<typeof tweenSequenceSchema>;
export type SequenceStep = z.infer<typeof sequenceStepSchema>;
export type PropertyStep = z.infer<typeof propertyStepSchema>;
export type DelayStep = z.infer<typeof delayStepSchema>;

/**
 * Validate a sequence definition.
 *
 * @throws TweenError `InvalidArgument` listing every schema issue.
 *
 * @example
 * ```ts
 * const sequence = parseTweenSequence(JSON.parse(text));
 * ```
 */
export function parseTweenSequence(input: unknown): TweenSequence {
  const result = tweenSequenceSchema.safeParse(input);
  if (!result.success) {
    throw new TweenError(
      "InvalidArgument",
      `invalid tween sequence: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/** Whether a validated step is a delay. */
export function isDelayStep(step: SequenceStep): step is DelayStep {
  return "delay" in step;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
