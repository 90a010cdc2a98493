/**
 * Warning output for declarative sequences.
 */

const PREFIX = "[lerpline:sequence]";

export function warn(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}
