import { env } from "@download-stats/client";
import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs";
import { StatsConfig } from "./config";
import { CratesIoClient } from "./crates-client";
import { GitHubClient } from "./github-client";
import { StatsStore } from "./store";
import { runAggregate, runCollect } from "./tasks/stats/collect";
import { generateAllCharts } from "./tasks/stats/stats.charts";
import { ExportFormat, exportTable, parseExportTable } from "./tasks/stats/stats.exports";
import { latestReport, totalReport, weeklyReport } from "./tasks/stats/stats.reports";
import { parseSourceFilter } from "./types";

interface GlobalOptions {
  database: string;
  config: string;
}

function parseLimit(value: string): number {
  const limit = parseInt(value, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return limit;
}

async function withStore<T>(
  command: Command,
  fn: (store: StatsStore, options: GlobalOptions) => Promise<T>
): Promise<T> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const store = StatsStore.open(options.database);
  try {
    return await fn(store, options);
  } finally {
    await store.close();
  }
}

function addExportCommand(parent: Command, format: ExportFormat): void {
  parent
    .command(format)
    .description(`Export a table to ${format.toUpperCase()}`)
    .requiredOption("-o, --output <file>", "Output file")
    .option("-t, --table <table>", "Table to export (weekly, daily, github)", "weekly")
    .action(async (options: { output: string; table: string }, command: Command) => {
      const table = parseExportTable(options.table);
      await withStore(command, (store) => exportTable(store, format, table, options.output));
    });
}

/**
 * Builds the `download-stats` command tree. Database and config paths are
 * global options so every subcommand accepts them.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("download-stats")
    .description("Collect, aggregate and report GitHub release and crates.io download statistics")
    .version("0.1.0")
    .option("-d, --database <path>", "SQLite database path", env.STATS_DB_PATH)
    .option("-c, --config <path>", "Sources config file (TOML)", env.STATS_CONFIG_PATH);

  program
    .command("collect")
    .description("Fetch statistics from every configured source and update weekly aggregates")
    .option("--skip-github", "Skip GitHub release collection")
    .option("--skip-crates", "Skip crates.io collection")
    .option("--skip-aggregation", "Skip weekly aggregate computation")
    .action(
      async (
        options: { skipGithub?: boolean; skipCrates?: boolean; skipAggregation?: boolean },
        command: Command
      ) => {
        await withStore(command, async (store, globals) => {
          const config = StatsConfig.load(globals.config);
          const clients = {
            github: new GitHubClient({
              authToken: env.GITHUB_TOKEN,
              userAgent: env.STATS_USER_AGENT,
            }),
            crates: new CratesIoClient({ userAgent: env.STATS_USER_AGENT }),
          };
          await runCollect(store, config, clients, options);
        });
      }
    );

  program
    .command("aggregate")
    .description("Recompute weekly aggregates from the raw tables")
    .action(async (_options: object, command: Command) => {
      await withStore(command, (store) => runAggregate(store));
    });

  program
    .command("charts")
    .description("Render SVG charts of the collected statistics")
    .option("-o, --output <dir>", "Output directory", "charts")
    .action(async (options: { output: string }, command: Command) => {
      await withStore(command, async (store, globals) => {
        // Tag prefixes only refine version grouping; charts render without a config.
        const tagPrefixes = fs.existsSync(globals.config)
          ? StatsConfig.load(globals.config).tagPrefixes
          : [];
        await generateAllCharts(store, options.output, tagPrefixes);
      });
    });

  const query = program.command("query").description("Query the weekly aggregates");

  query
    .command("weekly")
    .description("Weekly totals, newest first")
    .option("-n, --limit <n>", "Number of weeks", parseLimit, 12)
    .option("-s, --source <source>", "github, crates or all", "all")
    .action(async (options: { limit: number; source: string }, command: Command) => {
      await withStore(command, async (store) => {
        console.log(
          await weeklyReport(store, options.limit, parseSourceFilter(options.source))
        );
      });
    });

  query
    .command("total")
    .description("Total downloads for a source")
    .option("-s, --source <source>", "github, crates or all", "all")
    .action(async (options: { source: string }, command: Command) => {
      await withStore(command, async (store) => {
        console.log(await totalReport(store, parseSourceFilter(options.source)));
      });
    });

  query
    .command("latest")
    .description("Latest week and data coverage")
    .action(async (_options: object, command: Command) => {
      await withStore(command, async (store) => {
        console.log(await latestReport(store));
      });
    });

  const exportCommand = program.command("export").description("Export raw or weekly data");
  addExportCommand(exportCommand, "csv");
  addExportCommand(exportCommand, "json");

  return program;
}
