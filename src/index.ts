/**
 * nt - plain-text notes in a directory.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

export { NtError, UsageError, errorMessage } from "./lib/errors.js";

// Re-export configuration
export {
  loadConfig,
  readConfigFile,
  defaultBaseDirectory,
  CONFIG_FILE,
  DEFAULT_BASE_DIR,
  DEFAULT_EDITOR,
} from "./lib/config.js";
export type { NtConfig, ConfigFile } from "./lib/config.js";

export { resolvePath } from "./lib/paths.js";

// Re-export storage functions
export {
  baseDirectoryExists,
  ensureBaseDirectory,
  listNotes,
  createNote,
  deleteNote,
} from "./lib/storage.js";

export { createSubprocessTools } from "./lib/tools.js";
export type { ExternalTools } from "./lib/tools.js";

export { dispatch, validateCommand } from "./commands/index.js";
export type { CommandContext, CommandHandler } from "./commands/index.js";

export { createProgram, runCli, reportError } from "./program.js";
export type { ProgramOptions } from "./program.js";
