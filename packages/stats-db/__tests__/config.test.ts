import { describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { StatsConfig } from "../src/config";
import { ConfigError, formatErrorChain } from "../src/errors";

describe("StatsConfig", () => {
  it("should split sources by kind", () => {
    const config = StatsConfig.parse(
      `
[[source]]
kind = "github"
owner = "example-org"
repo = "tool"
tag_prefix = "tool-"

[[source]]
kind = "github"
owner = "example-org"
repo = "helper"

[[source]]
kind = "crates"
name = "sample-crate"
`,
      "config.toml"
    );

    expect(config.githubSources).toEqual([
      { owner: "example-org", repo: "tool", tagPrefix: "tool-" },
      { owner: "example-org", repo: "helper", tagPrefix: undefined },
    ]);
    expect(config.cratesSources).toEqual(["sample-crate"]);
    expect(config.tagPrefixes).toEqual(["tool-"]);
  });

  it("should accept a file without sources", () => {
    const config = StatsConfig.parse("# nothing yet\n", "config.toml");
    expect(config.githubSources).toEqual([]);
    expect(config.cratesSources).toEqual([]);
  });

  it("should reject an unknown source kind", () => {
    expect(() =>
      StatsConfig.parse('[[source]]\nkind = "pypi"\nname = "x"\n', "config.toml")
    ).toThrow(ConfigError);
  });

  it("should list missing fields with their path", () => {
    expect(() =>
      StatsConfig.parse('[[source]]\nkind = "github"\nowner = "example-org"\n', "config.toml")
    ).toThrow("invalid config file (source.0.repo: Required) at config.toml");
  });

  it("should report TOML syntax errors with the path", () => {
    expect(() => StatsConfig.parse("[[source]\n", "broken.toml")).toThrow(
      "failed to parse config file at broken.toml"
    );
  });

  it("should load from disk", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "download-stats-config-"));
    try {
      const file = path.join(dir, "config.toml");
      writeFileSync(file, '[[source]]\nkind = "crates"\nname = "sample-crate"\n');
      expect(StatsConfig.load(file).cratesSources).toEqual(["sample-crate"]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should name a missing file", () => {
    const missing = path.join(tmpdir(), "download-stats-missing", "config.toml");
    let caught: unknown;
    try {
      StatsConfig.load(missing);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(
      formatErrorChain(caught).startsWith(`failed to read config file at ${missing}: ENOENT`)
    ).toBe(true);
  });
});

describe("formatErrorChain", () => {
  it("should join nested causes", () => {
    const error = new Error("outer", {
      cause: new Error("middle", { cause: "innermost" }),
    });
    expect(formatErrorChain(error)).toBe("outer: middle: innermost");
  });
});
