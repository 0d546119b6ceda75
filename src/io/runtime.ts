/**
 * Effect platform layer selection
 *
 * File I/O goes through Effect's platform FileSystem service; this module
 * supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
