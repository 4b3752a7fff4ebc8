/**
 * Core data models for nt.
 *
 * A note is nothing more than a file in the base directory; everything
 * else here describes the command surface around it.
 */

/**
 * Commands understood by the dispatcher, in help order.
 */
export const COMMANDS = [
  "usage",
  "init",
  "list",
  "view",
  "add",
  "edit",
  "delete",
] as const;

export type CommandName = (typeof COMMANDS)[number];

/**
 * Actions offered after a note is picked from the interactive list.
 */
export const LIST_ACTIONS = ["view", "edit"] as const;

export type ListAction = (typeof LIST_ACTIONS)[number];

/**
 * A note on disk.
 */
export interface Note {
  /** File name inside the base directory */
  name: string;
  /** Absolute path to the file */
  path: string;
}

/**
 * A validated command plus its optional note name.
 */
export interface CommandInvocation {
  command: CommandName;
  name?: string;
}

/**
 * Process exit codes.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
