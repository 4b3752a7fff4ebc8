/**
 * nt view - Render a note.
 */

import { resolvePath } from "../lib/paths.js";
import { baseDirectoryExists } from "../lib/storage.js";
import type { CommandContext } from "./index.js";

/**
 * The note is not checked for existence; a missing file is left to the
 * renderer to report.
 */
export function viewCommand(
  { config, tools }: CommandContext,
  name: string | undefined,
): void {
  if (!name) {
    return;
  }

  if (!baseDirectoryExists(config)) {
    return;
  }

  tools.renderView(resolvePath(config, name));
}
