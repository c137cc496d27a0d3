/**
 * Effect platform layer selection
 *
 * All file system access goes through Effect Platform services; this module
 * supplies the Node.js implementation of those services and a helper that
 * runs a program against it.
 */

import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a FileSystem program to completion on the platform layer
 *
 * @example
 * ```typescript
 * const size = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return (yield* fs.stat("calls.vcf")).size;
 *   })
 * );
 * ```
 */
export function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>
): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}
