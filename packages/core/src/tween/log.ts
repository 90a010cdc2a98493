/**
 * Warning output for the tween runtime.
 *
 * Everything the core reports goes through here, with a fixed prefix so
 * host applications can filter it.
 */

const PREFIX = "[lerpline]";

/** Emit a runtime warning. */
export function warn(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}
