/**
 * Command-line surface: option parsing, help text and error reporting.
 *
 * Kept apart from cli.ts so the program can be built and driven in tests.
 */

import { Command, CommanderError } from "commander";
import { dispatch, validateCommand } from "./commands/index.js";
import { loadConfig, type NtConfig } from "./lib/config.js";
import { NtError, UsageError } from "./lib/errors.js";
import { ExitCodes, type ExitCode } from "./lib/models.js";
import { createSubprocessTools, type ExternalTools } from "./lib/tools.js";

const COMMANDS_HELP = `
Commands:
  usage          Display the usage information
  init           Initialize the notes directory
  list           List all notes (pick one to view or edit when gum is enabled)
  view [name]    View the note with the specified name
  add [name]     Add a new empty note with the specified name
  edit [name]    Edit the note with the specified name in $EDITOR (default: vi)
  delete [name]  Delete the note with the specified name

Examples:
  nt init
  nt add meeting_notes
  nt edit meeting_notes
  nt -b ~/work-notes list
  nt delete meeting_notes
`;

export interface ProgramOptions {
  /** Environment used for HOME and EDITOR */
  env?: NodeJS.ProcessEnv;
  /** Tool backend; subprocesses by default */
  createTools?: (config: NtConfig) => ExternalTools;
}

interface GlobalOptions {
  baseDirectory?: string;
}

/**
 * Build the `nt` program.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const createTools = options.createTools ?? createSubprocessTools;
  const program = new Command();

  program
    .name("nt")
    .description("Manage a collection of plain-text notes")
    .usage("[options] <command> [name]")
    .option(
      "-b, --base-directory <path>",
      "directory for storing notes (default: $HOME/.nt)",
    )
    .argument("[command]", "command to run (default: usage)")
    .argument("[name]", "note name")
    .allowExcessArguments()
    .addHelpText("after", COMMANDS_HELP)
    .exitOverride()
    .configureOutput({
      // reported by runCli as a usage error instead
      outputError: () => undefined,
    })
    .action(
      (
        command: string | undefined,
        name: string | undefined,
        opts: GlobalOptions,
      ) => {
        if (opts.baseDirectory === "") {
          throw new UsageError(
            "error in command line arguments (option '-b, --base-directory <path>' must not be empty)",
          );
        }

        const invocation = { command: validateCommand(command), name };
        // usage must work even with a broken config file
        const config = loadConfig({
          baseDirectory: opts.baseDirectory,
          env: options.env,
          readFile: invocation.command !== "usage",
        });

        dispatch(invocation, {
          config,
          tools: createTools(config),
          helpText: program.helpInformation() + COMMANDS_HELP,
        });
      },
    );

  return program;
}

/**
 * Parse `argv` and run the command it names. Malformed options become a
 * UsageError; errors from the command propagate.
 */
export function runCli(argv: string[], options: ProgramOptions = {}): void {
  const program = createProgram(options);

  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === ExitCodes.SUCCESS) {
        return;
      }
      const detail = err.message.replace(/^error: /, "");
      throw new UsageError(`error in command line arguments (${detail})`, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Print a fatal error to stderr and return the exit code to use.
 */
export function reportError(
  err: unknown,
  env: NodeJS.ProcessEnv = process.env,
): ExitCode {
  if (env.DEBUG) {
    console.error(err);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
  }

  return err instanceof NtError ? err.exitCode : ExitCodes.FAILURE;
}
