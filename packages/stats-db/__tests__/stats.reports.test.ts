import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { TableDump } from "../src/store";
import {
  exportTable,
  parseExportTable,
  toCsv,
  toJson,
} from "../src/tasks/stats/stats.exports";
import {
  formatNumber,
  latestReport,
  totalReport,
  weeklyReport,
} from "../src/tasks/stats/stats.reports";

describe("formatNumber", () => {
  it("should add thousands separators", () => {
    expect(formatNumber(1234567)).toBe("1,234,567");
    expect(formatNumber(999)).toBe("999");
    expect(formatNumber(0)).toBe("0");
  });
});

describe("weeklyReport", () => {
  it("should render a week table", async () => {
    const store = {
      getWeeklyTotals: vi.fn(async () => [
        { weekStart: "2025-11-24", downloads: 207 },
        { weekStart: "2025-11-17", downloads: 1234850 },
      ]),
    };

    const report = await weeklyReport(store, 2, "crates");

    expect(store.getWeeklyTotals).toHaveBeenCalledWith("crates", 2);
    expect(report).toBe(
      [
        "",
        "Week               Downloads",
        "==============================",
        "2025-11-24               207",
        "2025-11-17         1,234,850",
      ].join("\n")
    );
  });
});

describe("totalReport", () => {
  it.each([
    ["github", "GitHub releases (tracked period)"],
    ["crates", "crates.io (last year)"],
    ["all", "All sources"],
  ] as const)("should label the %s total", async (filter, label) => {
    const store = { getTotalDownloads: vi.fn(async () => 1057) };

    expect(await totalReport(store, filter)).toBe(
      `\nTotal downloads\n  Source: ${label}\n  Total:  1,057`
    );
  });
});

describe("latestReport", () => {
  it("should show the latest week, GitHub total and coverage", async () => {
    const store = {
      getLatestCratesWeek: vi.fn(async () => ({ weekStart: "2025-11-24", downloads: 7 })),
      getLatestGithubCumulative: vi.fn(async () => ({ date: "2025-11-25", downloads: 1700 })),
      getWeeklyCoverage: vi.fn(async () => ({
        firstWeek: "2025-11-17",
        lastWeek: "2025-11-24",
      })),
    };

    expect(await latestReport(store)).toBe(
      [
        "",
        "Latest statistics",
        "",
        "Latest week: 2025-11-24",
        "  crates.io: 7",
        "  GitHub (cumulative): 1,700",
        "",
        "Data coverage: 2025-11-17 to 2025-11-24",
      ].join("\n")
    );
  });

  it("should head the GitHub total with its snapshot date when no crates week exists", async () => {
    const store = {
      getLatestCratesWeek: vi.fn(async () => null),
      getLatestGithubCumulative: vi.fn(async () => ({ date: "2025-11-25", downloads: 1700 })),
      getWeeklyCoverage: vi.fn(async () => ({
        firstWeek: "2025-11-17",
        lastWeek: "2025-11-24",
      })),
    };

    expect(await latestReport(store)).toBe(
      [
        "",
        "Latest statistics",
        "",
        "Latest snapshot: 2025-11-25",
        "  GitHub (cumulative): 1,700",
        "",
        "Data coverage: 2025-11-17 to 2025-11-24",
      ].join("\n")
    );
  });

  it("should say when there is nothing yet", async () => {
    const store = {
      getLatestCratesWeek: vi.fn(async () => null),
      getLatestGithubCumulative: vi.fn(async () => null),
      getWeeklyCoverage: vi.fn(async () => null),
    };

    expect(await latestReport(store)).toBe("\nNo weekly statistics available yet.");
  });
});

describe("exports", () => {
  const dump: TableDump = {
    columns: ["week_start", "source", "identifier", "downloads"],
    rows: [
      { week_start: "2025-11-17", source: "crates", identifier: "sample-crate", downloads: 350 },
      { week_start: "2025-11-17", source: "github", identifier: 'odd,"name"', downloads: 500 },
      { week_start: "2025-11-24", source: "crates", identifier: null, downloads: 7 },
    ],
  };

  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "download-stats-export-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should accept the known tables only", () => {
    expect(parseExportTable("daily")).toBe("daily");
    expect(() => parseExportTable("monthly")).toThrow(
      "Unknown table type: monthly. Use 'weekly', 'daily', or 'github'"
    );
  });

  it("should quote CSV cells that need it", () => {
    expect(toCsv(dump)).toBe(
      "week_start,source,identifier,downloads\n" +
        "2025-11-17,crates,sample-crate,350\n" +
        '2025-11-17,github,"odd,""name""",500\n' +
        "2025-11-24,crates,,7\n"
    );
  });

  it("should quote cells holding a carriage return", () => {
    expect(toCsv({ columns: ["identifier"], rows: [{ identifier: "x\ry" }] })).toBe(
      'identifier\n"x\ry"\n'
    );
  });

  it("should write rows as a JSON array", () => {
    expect(JSON.parse(toJson(dump))).toEqual(dump.rows);
    expect(toJson({ columns: [], rows: [] })).toBe("[]");
  });

  it("should create parent directories for the output file", async () => {
    const output = path.join(dir, "nested", "weekly.csv");
    const store = { dumpTable: vi.fn(async () => dump) };

    await exportTable(store, "csv", "weekly", output);

    expect(store.dumpTable).toHaveBeenCalledWith("weekly");
    expect(readFileSync(output, "utf8")).toBe(toCsv(dump));
    expect(console.log).toHaveBeenCalledWith(`Exported to ${output}.`);
  });
});
