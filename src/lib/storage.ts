/**
 * Note store: the base directory and the flat files inside it.
 *
 * Every path goes through the path resolver; nothing here creates the
 * base directory except ensureBaseDirectory.
 */

import * as fs from "node:fs";
import type { NtConfig } from "./config.js";
import { NtError, errorMessage } from "./errors.js";
import type { Note } from "./models.js";
import { resolvePath } from "./paths.js";

/**
 * Whether the base directory exists and is a directory.
 */
export function baseDirectoryExists(config: NtConfig): boolean {
  const dir = resolvePath(config);
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

/**
 * Create the base directory, including parents, if it is missing.
 */
export function ensureBaseDirectory(config: NtConfig): void {
  const dir = resolvePath(config);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new NtError(`could not create ${dir}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * List the notes in the base directory.
 *
 * Hidden entries are skipped. Order is whatever the directory read
 * returns; nothing is sorted.
 */
export function listNotes(config: NtConfig): Note[] {
  if (!baseDirectoryExists(config)) {
    return [];
  }

  let entries: string[];
  try {
    entries = fs.readdirSync(resolvePath(config));
  } catch (err) {
    throw new NtError(`could not list notes: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return entries
    .filter((name) => !name.startsWith("."))
    .map((name) => ({ name, path: resolvePath(config, name) }));
}

/**
 * Create an empty note, or bump the modification time of an existing one.
 */
export function createNote(config: NtConfig, name?: string): void {
  if (!name) {
    return;
  }

  const filePath = resolvePath(config, name);
  try {
    if (fs.existsSync(filePath)) {
      const now = new Date();
      fs.utimesSync(filePath, now, now);
    } else {
      fs.writeFileSync(filePath, "", { flag: "a" });
    }
  } catch (err) {
    throw new NtError(`could not create \`${name}\`: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Remove a note.
 */
export function deleteNote(config: NtConfig, name?: string): void {
  if (!name) {
    return;
  }

  try {
    fs.unlinkSync(resolvePath(config, name));
  } catch (err) {
    throw new NtError(`could not delete \`${name}\``, { cause: err });
  }
}
