import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { createProgram } from "../src/cli";
import { StatsStore } from "../src/store";

let dir: string;
let dbPath: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), "download-stats-cli-"));
  dbPath = path.join(dir, "stats.db");
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(["-d", dbPath, ...args], { from: "user" });
}

describe("download-stats CLI", () => {
  it("should print totals from the given database", async () => {
    await run("query", "total", "--source", "crates");

    expect(console.log).toHaveBeenCalledWith(
      "\nTotal downloads\n  Source: crates.io (last year)\n  Total:  0"
    );
  });

  it("should aggregate and export weekly rows", async () => {
    const store = StatsStore.open(dbPath);
    await store.putCratesDownloads([
      { date: "2025-11-19", crateName: "sample-crate", version: "1", downloads: 42 },
    ]);
    await store.close();

    const output = path.join(dir, "out", "weekly.json");
    await run("aggregate");
    await run("export", "json", "-o", output);

    expect(JSON.parse(readFileSync(output, "utf8"))).toEqual([
      { week_start: "2025-11-17", source: "crates", identifier: "sample-crate", downloads: 42 },
    ]);
  });

  it("should limit the weekly query", async () => {
    const store = StatsStore.open(dbPath);
    await store.putWeeklyStats([
      { weekStart: "2025-11-10", source: "crates", identifier: "sample-crate", downloads: 1 },
      { weekStart: "2025-11-17", source: "crates", identifier: "sample-crate", downloads: 2 },
    ]);
    await store.close();

    await run("query", "weekly", "-n", "1");

    expect(console.log).toHaveBeenCalledWith(
      "\nWeek               Downloads\n==============================\n2025-11-17                 2"
    );
  });

  it("should reject an unknown export table", async () => {
    await expect(
      run("export", "csv", "-o", path.join(dir, "x.csv"), "-t", "monthly")
    ).rejects.toThrow("Unknown table type: monthly. Use 'weekly', 'daily', or 'github'");
  });

  it("should fail on a missing config file when collecting", async () => {
    const missing = path.join(dir, "absent.toml");
    await expect(run("-c", missing, "collect")).rejects.toThrow(
      `failed to read config file at ${missing}`
    );
  });
});
