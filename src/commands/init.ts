/**
 * nt init - Create the base directory.
 */

import { baseDirectoryExists, ensureBaseDirectory } from "../lib/storage.js";
import type { CommandContext } from "./index.js";

export function initCommand({ config }: CommandContext): void {
  if (baseDirectoryExists(config)) {
    return;
  }

  ensureBaseDirectory(config);
}
