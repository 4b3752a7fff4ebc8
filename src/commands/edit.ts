/**
 * nt edit - Open a note in the editor.
 */

import { resolvePath } from "../lib/paths.js";
import type { CommandContext } from "./index.js";

/**
 * Goes straight to the editor, so a note that does not exist yet is
 * created by the editor on save.
 */
export function editCommand(
  { config, tools }: CommandContext,
  name: string | undefined,
): void {
  if (!name) {
    return;
  }

  tools.invokeEditor(resolvePath(config, name));
}
