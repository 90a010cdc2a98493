/**
 * @lerpline/core — Driver-agnostic tweening runtime.
 *
 * Zero external dependencies. Runs in browsers and in Node.js.
 */

export * from "./tween/index.js";
