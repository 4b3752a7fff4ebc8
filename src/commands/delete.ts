/**
 * nt delete - Remove a note.
 */

import { deleteNote } from "../lib/storage.js";
import type { CommandContext } from "./index.js";

export function deleteCommand(
  { config }: CommandContext,
  name: string | undefined,
): void {
  deleteNote(config, name);
}
