/**
 * Effect platform layer selection
 *
 * The CLI and its tests run on Node.js, so every file-system effect is
 * provided by the Node platform context.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer that provides FileSystem, Path and friends
 *
 * @example
 * ```typescript
 * Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
