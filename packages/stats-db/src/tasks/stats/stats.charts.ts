import * as fs from "fs";
import * as path from "path";
import * as semver from "semver";
import * as vega from "vega";
import { compile, TopLevelSpec } from "vega-lite";
import { DayTotal, SourceWeekTotal, StatsStore, TagDayTotal, WeekTotal } from "../../store";

const CHART_WIDTH = 1400;
const CHART_HEIGHT = 760;

const FONT_FAMILY = "Inter";
const TITLE_SIZE = 24;
const LABEL_SIZE = 16;
const AXIS_SIZE = 14;

const BACKGROUND = "#fafafc";
const TEXT_PRIMARY = "#0f172a";
const TEXT_SECONDARY = "#64748b";
const GRID_COLOR = "#e2e8f0";
const ACCENT_BLUE = "#3b82f6";
const ACCENT_GREEN = "#22c55e";

// Release colors, most recent first; the last one is for "Other"
const VERSION_COLORS = ["#6366f1", "#3b82f6", "#22c55e", "#fb923c", "#ec4899", "#9ca3af"];

const OTHER_CATEGORY = "Other";
const MAX_VERSIONS = 5;
const MIN_VERSION_DOWNLOADS = 10_000;
const MIN_VERSION_SHARE = 0.005;

export interface ChartFile {
  file: string;
  spec: TopLevelSpec;
}

export interface VersionPoint {
  date: string;
  category: string;
  downloads: number;
}

/**
 * Reads the semver version out of a release tag, after stripping one of
 * `tagPrefixes` (or a leading "v"). When prefixes are given, tags without
 * any of them are not versions of this project.
 */
export function parseReleaseVersion(
  tag: string,
  tagPrefixes: string[] = []
): semver.SemVer | null {
  let candidate = tag;

  if (tagPrefixes.length > 0) {
    const prefix = tagPrefixes.find((p) => tag.startsWith(p));
    if (prefix === undefined) return null;
    candidate = tag.slice(prefix.length);
  }

  const cleaned = semver.clean(candidate);
  return cleaned ? semver.parse(cleaned) : null;
}

/**
 * Picks the releases that get their own series: the five most recent by
 * semver among those whose latest cumulative total is at least 10,000 or
 * 0.5% of the largest, whichever is higher.
 */
export function selectTopVersions(
  latestTotals: Array<{ releaseTag: string; downloads: number }>,
  tagPrefixes: string[] = []
): string[] {
  const versions = latestTotals
    .map((row) => ({ ...row, version: parseReleaseVersion(row.releaseTag, tagPrefixes) }))
    .filter(
      (row): row is { releaseTag: string; downloads: number; version: semver.SemVer } =>
        row.version !== null
    )
    .sort((a, b) => semver.rcompare(a.version, b.version));

  const maxDownloads = Math.max(0, ...versions.map((v) => v.downloads));
  const threshold = Math.floor(
    Math.max(maxDownloads * MIN_VERSION_SHARE, MIN_VERSION_DOWNLOADS)
  );

  return versions
    .filter((v) => v.downloads >= threshold)
    .slice(0, MAX_VERSIONS)
    .map((v) => v.releaseTag);
}

/** Cumulative totals per tag on the most recent snapshot date. */
export function latestTagTotals(rows: TagDayTotal[]): TagDayTotal[] {
  const latestDate = rows.reduce<string | null>(
    (latest, row) => (latest === null || row.date > latest ? row.date : latest),
    null
  );
  return rows.filter((row) => row.date === latestDate);
}

/**
 * One point per (date, category), where categories are `topTags` in order
 * followed by "Other" for everything else. Missing values are 0.
 */
export function buildVersionSeries(rows: TagDayTotal[], topTags: string[]): VersionPoint[] {
  const top = new Set(topTags);
  const byDate = new Map<string, Map<string, number>>();

  for (const row of rows) {
    const category = top.has(row.releaseTag) ? row.releaseTag : OTHER_CATEGORY;
    const totals = byDate.get(row.date) ?? new Map<string, number>();
    totals.set(category, (totals.get(category) ?? 0) + row.downloads);
    byDate.set(row.date, totals);
  }

  const categories = [...topTags, OTHER_CATEGORY];
  const dates = Array.from(byDate.keys()).sort();

  return dates.flatMap((date) =>
    categories.map((category) => ({
      date,
      category,
      downloads: byDate.get(date)?.get(category) ?? 0,
    }))
  );
}

function baseSpec(title: string) {
  return {
    $schema: "https://vega.github.io/schema/vega-lite/v5.json",
    width: CHART_WIDTH,
    height: CHART_HEIGHT,
    background: BACKGROUND,
    padding: 60,
    title: {
      text: title,
      font: FONT_FAMILY,
      fontSize: TITLE_SIZE,
      color: TEXT_PRIMARY,
    },
    config: {
      font: FONT_FAMILY,
      view: { stroke: null },
      axis: {
        labelFont: FONT_FAMILY,
        labelFontSize: AXIS_SIZE,
        labelColor: TEXT_SECONDARY,
        gridColor: GRID_COLOR,
        domainColor: GRID_COLOR,
        tickColor: GRID_COLOR,
      },
      axisX: { grid: false, tickCount: 8 },
      axisY: { tickCount: 6 },
      legend: {
        labelFont: FONT_FAMILY,
        labelFontSize: LABEL_SIZE,
        labelColor: TEXT_PRIMARY,
        fillColor: BACKGROUND,
        strokeColor: GRID_COLOR,
        padding: 15,
        orient: "top-left",
      },
    },
  } as const;
}

function dateEncoding(field: string) {
  return {
    field,
    type: "temporal",
    scale: { type: "utc" },
    axis: { format: "%Y-%m-%d", title: null },
  } as const;
}

function downloadsEncoding(field: string) {
  return {
    field,
    type: "quantitative",
    axis: { format: ",", title: null },
  } as const;
}

export function weeklyTrendsChart(rows: WeekTotal[]): ChartFile | null {
  if (rows.length === 0) return null;

  return {
    file: "weekly-trends.svg",
    spec: {
      ...baseSpec("Weekly Downloads - crates.io"),
      data: { values: rows.map((r) => ({ week: r.weekStart, downloads: r.downloads })) },
      mark: { type: "line", color: ACCENT_BLUE, strokeWidth: 3 },
      encoding: {
        x: dateEncoding("week"),
        y: downloadsEncoding("downloads"),
      },
    },
  };
}

export function githubCumulativeChart(rows: DayTotal[]): ChartFile | null {
  if (rows.length === 0) return null;

  return {
    file: "github-cumulative.svg",
    spec: {
      ...baseSpec("Cumulative Downloads - GitHub Releases"),
      data: { values: rows.map((r) => ({ date: r.date, downloads: r.downloads })) },
      encoding: {
        x: dateEncoding("date"),
        y: downloadsEncoding("downloads"),
      },
      layer: [
        { mark: { type: "area", color: ACCENT_GREEN, opacity: 0.15 } },
        { mark: { type: "line", color: ACCENT_GREEN, strokeWidth: 2 } },
      ],
    },
  };
}

export function githubByVersionChart(
  rows: TagDayTotal[],
  tagPrefixes: string[] = []
): ChartFile | null {
  const latest = latestTagTotals(rows);
  if (latest.length === 0) return null;

  const topTags = selectTopVersions(latest, tagPrefixes);
  const categories = [...topTags, OTHER_CATEGORY];
  const points = buildVersionSeries(rows, topTags);

  return {
    file: "github-by-version.svg",
    spec: {
      ...baseSpec("Cumulative Downloads by Version - GitHub Releases"),
      data: { values: points },
      encoding: {
        x: dateEncoding("date"),
        y: downloadsEncoding("downloads"),
        color: {
          field: "category",
          type: "nominal",
          sort: categories,
          legend: { title: null },
          scale: {
            domain: categories,
            range: categories.map(
              (_, i) =>
                i === categories.length - 1
                  ? VERSION_COLORS[VERSION_COLORS.length - 1]
                  : VERSION_COLORS[i % (VERSION_COLORS.length - 1)]
            ),
          },
        },
      },
      layer: [
        { mark: { type: "area", opacity: 0.3 } },
        { mark: { type: "line", strokeWidth: 2 } },
      ],
    },
  };
}

export function sourceComparisonChart(rows: SourceWeekTotal[]): ChartFile | null {
  if (rows.length === 0) return null;

  return {
    file: "source-comparison.svg",
    spec: {
      ...baseSpec("Weekly Downloads by Source"),
      data: {
        values: rows.map((r) => ({
          week: r.weekStart,
          source: r.source === "crates" ? "crates.io" : "GitHub",
          downloads: r.downloads,
        })),
      },
      mark: { type: "line", strokeWidth: 3 },
      encoding: {
        x: dateEncoding("week"),
        y: downloadsEncoding("downloads"),
        color: {
          field: "source",
          type: "nominal",
          legend: { title: null },
          scale: { domain: ["crates.io", "GitHub"], range: [ACCENT_BLUE, ACCENT_GREEN] },
        },
      },
    },
  };
}

/**
 * Compiles a vega-lite spec and renders it headless to an SVG string.
 */
export async function renderSvg(spec: TopLevelSpec): Promise<string> {
  const view = new vega.View(vega.parse(compile(spec).spec), {
    renderer: "none",
  });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

/**
 * Renders every chart that has data into `outputDir` and returns the
 * written file names.
 */
export async function generateAllCharts(
  store: Pick<
    StatsStore,
    | "getCratesWeeklyTotals"
    | "getGithubCumulativeByDate"
    | "getGithubCumulativeByDateAndTag"
    | "getWeeklyTotalsBySource"
  >,
  outputDir: string,
  tagPrefixes: string[] = []
): Promise<string[]> {
  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw new Error(`failed to create output directory at ${outputDir}`, {
      cause: error,
    });
  }

  console.log("\nGenerating charts...");

  const charts = [
    weeklyTrendsChart(await store.getCratesWeeklyTotals()),
    githubCumulativeChart(await store.getGithubCumulativeByDate()),
    githubByVersionChart(await store.getGithubCumulativeByDateAndTag(), tagPrefixes),
    sourceComparisonChart(await store.getWeeklyTotalsBySource()),
  ];

  const written: string[] = [];
  for (const chart of charts) {
    if (!chart) continue;
    const svg = await renderSvg(chart.spec);
    fs.writeFileSync(path.join(outputDir, chart.file), svg);
    console.log(`  • ${chart.file}`);
    written.push(chart.file);
  }

  console.log(`  ✓ Charts saved to ${outputDir}`);
  return written;
}
