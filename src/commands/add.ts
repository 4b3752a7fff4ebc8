/**
 * nt add - Create an empty note.
 */

import { createNote } from "../lib/storage.js";
import type { CommandContext } from "./index.js";

export function addCommand(
  { config }: CommandContext,
  name: string | undefined,
): void {
  createNote(config, name);
}
