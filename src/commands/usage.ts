/**
 * nt usage - Print the help text.
 */

import type { CommandContext } from "./index.js";

export function usageCommand(context: CommandContext): void {
  console.log(context.helpText.trimEnd());
}
