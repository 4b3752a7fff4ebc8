/**
 * nt list - List notes, or pick one and an action with the chooser.
 */

import { LIST_ACTIONS } from "../lib/models.js";
import { listNotes } from "../lib/storage.js";
import type { ExternalTools } from "../lib/tools.js";
import type { CommandContext } from "./index.js";

/**
 * Prompt and strip the newline the chooser prints after its selection.
 * Null when interactive mode is off.
 */
function choose(
  tools: ExternalTools,
  options: readonly string[],
): string | null {
  const choice = tools.promptChoice(options);
  return choice === null ? null : choice.replace(/\r?\n$/, "");
}

export function listCommand({ config, tools }: CommandContext): void {
  const notes = listNotes(config);
  if (notes.length === 0) {
    return;
  }

  const picked = choose(tools, notes.map((n) => n.name));
  if (picked === null) {
    for (const note of notes) {
      console.log(note.name);
    }
    return;
  }

  const note = notes.find((n) => n.name === picked);
  if (!note) {
    return;
  }

  const choice = choose(tools, LIST_ACTIONS);
  const action = LIST_ACTIONS.find((a) => a === choice);
  if (!action) {
    return;
  }

  switch (action) {
    case "view":
      tools.renderView(note.path);
      break;
    case "edit":
      tools.invokeEditor(note.path);
      break;
  }
}
