/**
 * Tests for configuration loading.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  loadConfig,
  readConfigFile,
  defaultBaseDirectory,
  CONFIG_FILE,
} from "./config.js";
import { NtError } from "./errors.js";

describe("Configuration", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "nt-config-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("defaultBaseDirectory", () => {
    it("should be .nt under HOME", () => {
      expect(defaultBaseDirectory({ HOME: "/home/someone" })).toBe(
        path.join("/home/someone", ".nt"),
      );
    });

    it("should fall back to the OS home directory", () => {
      expect(defaultBaseDirectory({})).toBe(path.join(os.homedir(), ".nt"));
    });
  });

  describe("loadConfig", () => {
    it("should use defaults when nothing is configured", () => {
      const config = loadConfig({ env: { HOME: tempDir } });

      expect(config).toEqual({
        baseDirectory: path.join(tempDir, ".nt"),
        glow: true,
        gum: true,
        editor: "vi",
      });
    });

    it("should resolve the base directory override", () => {
      const config = loadConfig({
        baseDirectory: path.join(tempDir, "notes"),
        env: { HOME: "/nowhere" },
      });

      expect(config.baseDirectory).toBe(path.join(tempDir, "notes"));
    });

    it("should take the editor from EDITOR", () => {
      const config = loadConfig({ env: { HOME: tempDir, EDITOR: "nano" } });
      expect(config.editor).toBe("nano");
    });

    it("should apply the config file", () => {
      fs.writeFileSync(
        path.join(tempDir, CONFIG_FILE),
        'glow = false\ngum = false\neditor = "micro"\n',
      );

      const config = loadConfig({ baseDirectory: tempDir, env: {} });

      expect(config.glow).toBe(false);
      expect(config.gum).toBe(false);
      expect(config.editor).toBe("micro");
    });

    it("should prefer EDITOR over the config file", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE), 'editor = "micro"\n');

      const config = loadConfig({
        baseDirectory: tempDir,
        env: { EDITOR: "nano" },
      });

      expect(config.editor).toBe("nano");
    });

    it("should ignore an empty EDITOR", () => {
      const config = loadConfig({
        baseDirectory: tempDir,
        env: { EDITOR: "" },
      });
      expect(config.editor).toBe("vi");
    });

    it("should resolve an empty override instead of using HOME", () => {
      const config = loadConfig({
        baseDirectory: "",
        env: { HOME: tempDir },
      });
      expect(config.baseDirectory).toBe(process.cwd());
    });

    it("should skip the config file when asked", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE), "gum = =\n");

      const config = loadConfig({
        baseDirectory: tempDir,
        env: {},
        readFile: false,
      });

      expect(config.gum).toBe(true);
    });

    it("should be frozen", () => {
      const config = loadConfig({ baseDirectory: tempDir, env: {} });
      expect(Object.isFrozen(config)).toBe(true);
    });
  });

  describe("readConfigFile", () => {
    it("should return an empty config when the file is missing", () => {
      expect(readConfigFile(tempDir)).toEqual({});
    });

    it("should reject malformed TOML", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE), "gum = = true\n");

      expect(() => readConfigFile(tempDir)).toThrow(NtError);
      expect(() => readConfigFile(tempDir)).toThrow(/^could not read /);
    });

    it("should reject values of the wrong type", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE), 'gum = "yes"\n');

      expect(() => readConfigFile(tempDir)).toThrow(
        /^invalid config file .*gum: /,
      );
    });

    it("should reject unknown keys", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE), "colour = true\n");

      expect(() => readConfigFile(tempDir)).toThrow(/^invalid config file /);
    });
  });
});
