/**
 * Unit tests for CLI argument parsing
 */

import path from "node:path";
import { describe, expect, it } from "vitest";
import { HELP_TEXT, parseArgs } from "../../../src/cli/args.js";

const CWD = path.resolve("/work/game");

describe("parseArgs", () => {
  it("should default to the config in the working directory", () => {
    expect(parseArgs([], CWD)).toEqual({
      config: path.join(CWD, "generator.config.json"),
      dump: false,
      verbose: false,
      help: false,
    });
  });

  it("should resolve --config relative to the working directory", () => {
    expect(parseArgs(["--config", "tools/gen.json"], CWD).config).toBe(
      path.join(CWD, "tools", "gen.json"),
    );
    expect(parseArgs(["-c", "/etc/gen.json"], CWD).config).toBe(
      path.resolve("/etc/gen.json"),
    );
  });

  it("should read the boolean flags", () => {
    const opts = parseArgs(["--dump", "-v", "--help"], CWD);
    expect(opts.dump).toBe(true);
    expect(opts.verbose).toBe(true);
    expect(opts.help).toBe(true);
  });

  it("should reject a --config without a value", () => {
    expect(() => parseArgs(["--config"], CWD)).toThrow(
      "Missing value for -c/--config",
    );
  });

  it("should reject unknown options", () => {
    expect(() => parseArgs(["--watch"], CWD)).toThrow("Unknown option: --watch");
  });

  it("should document every option", () => {
    for (const flag of ["--config", "--dump", "--verbose", "--help"]) {
      expect(HELP_TEXT).toContain(flag);
    }
  });
});
