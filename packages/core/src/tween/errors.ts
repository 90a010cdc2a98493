/**
 * Error taxonomy for tween construction.
 *
 * These errors are raised by the lower-level building blocks (registry
 * resolution, property binding, sequence parsing). The factories that build
 * tweens catch them and hand back an inert handle instead, so a broken tween
 * never takes down the host loop.
 */

/** Machine-readable reason attached to every {@link TweenError}. */
export type TweenErrorCode =
  | "InvalidArgument"
  | "UnsupportedValueKind"
  | "NoSuchProperty";

/**
 * An error detected while building a tween.
 *
 * @example
 * ```ts
 * try {
 *   interpolators.resolve(someKind);
 * } catch (error) {
 *   if (error instanceof TweenError && error.code === "UnsupportedValueKind") {
 *     // register a blend for the kind first
 *   }
 * }
 * ```
 */
export class TweenError extends Error {
  readonly code: TweenErrorCode;

  constructor(code: TweenErrorCode, message: string) {
    super(message);
    this.name = "TweenError";
    this.code = code;
  }
}

/** Render an unknown thrown value as a log-friendly string. */
export function describeError(error: unknown): string {
  if (error instanceof TweenError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
