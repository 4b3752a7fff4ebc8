/**
 * External tool adapter.
 *
 * The dispatcher talks to the chooser, the renderer and the editor only
 * through ExternalTools, so a different backend can be dropped in.
 */

import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import type { NtConfig } from "./config.js";
import { NtError, errorMessage } from "./errors.js";

export interface ExternalTools {
  /**
   * Ask the user to pick one of `options`. Returns the chooser's raw
   * stdout (trailing newline included), or null when interactive mode is
   * off.
   */
  promptChoice(options: readonly string[]): string | null;
  /** Page the rendered file in the foreground. */
  renderView(filePath: string): void;
  /** Open the file in the editor and wait for it to exit. */
  invokeEditor(filePath: string): void;
}

function ensureLaunched<T>(
  program: string,
  result: SpawnSyncReturns<T>,
): SpawnSyncReturns<T> {
  if (result.error) {
    throw new NtError(
      `could not run \`${program}\`: ${errorMessage(result.error)}`,
      { cause: result.error },
    );
  }
  return result;
}

/**
 * ExternalTools backed by gum, glow and $EDITOR subprocesses.
 */
export function createSubprocessTools(config: NtConfig): ExternalTools {
  return {
    promptChoice(options) {
      if (!config.gum) {
        return null;
      }

      const result = ensureLaunched(
        "gum",
        spawnSync("gum", ["choose", "--", ...options], {
          stdio: ["inherit", "pipe", "inherit"],
          encoding: "utf-8",
        }),
      );
      return result.stdout;
    },

    renderView(filePath) {
      if (!config.glow) {
        return;
      }

      // glow reports a missing file itself; its status is not checked
      ensureLaunched(
        "glow",
        spawnSync("glow", ["-p", filePath], { stdio: "inherit" }),
      );
    },

    invokeEditor(filePath) {
      const result = ensureLaunched(
        config.editor,
        spawnSync(config.editor, [filePath], { stdio: "inherit" }),
      );

      if (result.signal) {
        throw new NtError(`editor terminated by signal ${result.signal}`);
      }
      if (result.status !== 0) {
        throw new NtError(
          `editor exited with non-zero status: ${result.status ?? "unknown"}`,
        );
      }
    },
  };
}
