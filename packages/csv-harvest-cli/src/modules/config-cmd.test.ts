import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerConfigCommands } from "./config-cmd.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { invalidConfig } from "../lib/errors/catalog.js";
import type { ResolvedConfig } from "../lib/config.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign((s: string) => s, { bold: plain }),
      green: plain,
      yellow: plain,
      cyan: plain,
      gray: plain,
      dim: plain,
      bold: plain,
    },
  };
});

// Mock config module
vi.mock("../lib/config.js", () => ({
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  USER_CONFIG_PATH: "/home/user/.config/csv-harvest/config.yaml",
  SYSTEM_CONFIG_PATH: "/etc/csv-harvest/config.yaml",
}));

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { loadConfig, loadConfigFile } from "../lib/config.js";

const EFFECTIVE: ResolvedConfig = {
  timeoutMs: 45000,
  userAgent: "csv-harvest",
  manifestName: "output.csv",
  logLevel: "info",
  logJson: false,
};

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.clearAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  describe("config init", () => {
    it("creates user config file when it does not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/csv-harvest", { recursive: true });
      expect(writeFileSync).toHaveBeenCalledWith(
        "/home/user/.config/csv-harvest/config.yaml",
        expect.stringContaining("# csv-harvest configuration"),
        "utf-8"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/csv-harvest/config.yaml"
      );
    });

    it("creates system config with --global flag", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).toHaveBeenCalledWith(
        "/etc/csv-harvest/config.yaml",
        expect.any(String),
        "utf-8"
      );
    });

    it("does not overwrite existing config file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /home/user/.config/csv-harvest/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("suggests sudo when the system config cannot be written", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to create config: Permission denied");
      expect(consoleErrorSpy).toHaveBeenCalledWith("System config may require sudo.");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("checks only the files that exist", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).startsWith("/home"));
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(loadConfigFile).toHaveBeenCalledWith("/home/user/.config/csv-harvest/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("\nAll configuration files are valid.");
    });

    it("validates the file named by the global --config flag", async () => {
      initContext(["node", "test", "--config", "/custom/config.yaml"], {});
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledWith("/custom/config.yaml");
      expect(loadConfigFile).toHaveBeenCalledTimes(1);
    });

    it("reports validation errors with their details", async () => {
      initContext(["node", "test", "-c", "/bad/config.yaml"], {});
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementation(() => {
        throw invalidConfig("/bad/config.yaml", ["download.timeoutMs: Expected number, received string"]);
      });

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "  ✗ Invalid: Config file /bad/config.yaml has errors\ndownload.timeoutMs: Expected number, received string"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports file not found for an explicit path", async () => {
      initContext(["node", "test", "-c", "/missing/config.yaml"], {});
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("File not found: /missing/config.yaml");
      expect(process.exitCode).toBe(1);
    });

    it("shows message when no config files found", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe("config show", () => {
    it("displays effective configuration", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: EFFECTIVE,
        sources: ["/home/user/.config/csv-harvest/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Effective Configuration:");
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Sources: /home/user/.config/csv-harvest/config.yaml"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("  timeoutMs:      45000");
      expect(consoleLogSpy).toHaveBeenCalledWith("  manifestName:   output.csv");
    });

    it("shows defaults only message when no sources", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: EFFECTIVE, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Sources: (defaults only)");
    });

    it("prints a JSON document in JSON mode", async () => {
      initContext(["node", "test", "--json"], {});
      vi.mocked(loadConfig).mockReturnValue({ config: EFFECTIVE, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: { effective: EFFECTIVE, sources: [] },
      });
    });

    it("passes the global --config path through", async () => {
      initContext(["node", "test", "-c", "/custom/config.yaml"], {});
      vi.mocked(loadConfig).mockReturnValue({ config: EFFECTIVE, sources: ["/custom/config.yaml"] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });

    it("renders config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config parse error");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Config parse error");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config path", () => {
    it("displays config file locations and whether they exist", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).startsWith("/etc"));

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "Configuration file locations:",
        undefined,
        "User config:",
        "  /home/user/.config/csv-harvest/config.yaml",
        "  (not found)",
        undefined,
        "System config:",
        "  /etc/csv-harvest/config.yaml",
        "  (exists)",
      ]);
    });
  });
});
