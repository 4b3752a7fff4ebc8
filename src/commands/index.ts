/**
 * Command dispatcher.
 *
 * Validates the command token against COMMANDS and routes the invocation
 * to exactly one operation.
 */

import type { NtConfig } from "../lib/config.js";
import {
  COMMANDS,
  type CommandInvocation,
  type CommandName,
} from "../lib/models.js";
import type { ExternalTools } from "../lib/tools.js";
import { usageCommand } from "./usage.js";
import { initCommand } from "./init.js";
import { listCommand } from "./list.js";
import { viewCommand } from "./view.js";
import { addCommand } from "./add.js";
import { editCommand } from "./edit.js";
import { deleteCommand } from "./delete.js";

/**
 * Everything an operation may touch.
 */
export interface CommandContext {
  config: NtConfig;
  tools: ExternalTools;
  /** Text printed by `usage` */
  helpText: string;
}

export type CommandHandler = (
  context: CommandContext,
  name: string | undefined,
) => void;

const HANDLERS: Record<CommandName, CommandHandler> = {
  usage: usageCommand,
  init: initCommand,
  list: listCommand,
  view: viewCommand,
  add: addCommand,
  edit: editCommand,
  delete: deleteCommand,
};

/**
 * Map a raw command token to a command. Missing or unknown tokens fall
 * back to `usage`.
 */
export function validateCommand(token: string | undefined): CommandName {
  return COMMANDS.find((command) => command === token) ?? "usage";
}

/**
 * Run one command.
 */
export function dispatch(
  invocation: CommandInvocation,
  context: CommandContext,
): void {
  HANDLERS[invocation.command](context, invocation.name);
}
