import * as path from "node:path";
import type { NtConfig } from "./config.js";

/**
 * Join the base directory with zero or more path segments.
 */
export function resolvePath(config: NtConfig, ...components: string[]): string {
  return path.join(config.baseDirectory, ...components);
}
