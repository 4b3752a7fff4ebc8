#!/usr/bin/env node
/**
 * nt CLI entry point.
 */

import { reportError, runCli } from "./program.js";

try {
  runCli(process.argv);
} catch (err) {
  process.exit(reportError(err));
}
