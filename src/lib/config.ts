/**
 * Configuration for nt.
 *
 * Built once at startup from defaults, the optional `.config.toml` in the
 * base directory, the environment and the command line, then passed to
 * every component that needs it.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import toml from "toml";
import { z } from "zod";
import { NtError, errorMessage } from "./errors.js";

/** Base directory name under the home directory */
export const DEFAULT_BASE_DIR = ".nt";

/** Config file name inside the base directory (hidden, so never listed) */
export const CONFIG_FILE = ".config.toml";

/** Editor used when neither $EDITOR nor the config file names one */
export const DEFAULT_EDITOR = "vi";

export interface NtConfig {
  /** Directory holding the notes */
  readonly baseDirectory: string;
  /** Render notes with glow */
  readonly glow: boolean;
  /** Pick notes interactively with gum */
  readonly gum: boolean;
  /** Editor program for `edit` */
  readonly editor: string;
}

const configFileSchema = z
  .object({
    glow: z.boolean().optional(),
    gum: z.boolean().optional(),
    editor: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Default base directory: `$HOME/.nt`.
 */
export function defaultBaseDirectory(env: NodeJS.ProcessEnv): string {
  return path.join(env.HOME || os.homedir(), DEFAULT_BASE_DIR);
}

/**
 * Read `.config.toml` from the base directory. A missing file yields an
 * empty config; an unreadable or invalid one is fatal.
 */
export function readConfigFile(baseDirectory: string): ConfigFile {
  const configPath = path.join(baseDirectory, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new NtError(`could not read ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new NtError(`invalid config file ${configPath}: ${issues}`);
  }
  return result.data;
}

/**
 * Build the process-wide configuration. With `readFile: false` the config
 * file is skipped and only defaults and the environment apply.
 */
export function loadConfig(
  options: {
    baseDirectory?: string;
    env?: NodeJS.ProcessEnv;
    readFile?: boolean;
  } = {},
): NtConfig {
  const env = options.env ?? process.env;
  const baseDirectory =
    options.baseDirectory !== undefined
      ? path.resolve(options.baseDirectory)
      : defaultBaseDirectory(env);

  const file =
    options.readFile === false ? {} : readConfigFile(baseDirectory);

  return Object.freeze({
    baseDirectory,
    glow: file.glow ?? true,
    gum: file.gum ?? true,
    editor: env.EDITOR || file.editor || DEFAULT_EDITOR,
  });
}
