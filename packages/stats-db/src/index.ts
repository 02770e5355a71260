export * from "./aggregate";
export * from "./config";
export * from "./crates-client";
export * from "./db";
export * from "./errors";
export * from "./github-client";
export * from "./store";
export * from "./types";
export { createProgram } from "./cli";
export { runAggregate, runCollect } from "./tasks/stats/collect";
export type { CollectClients, CollectOptions } from "./tasks/stats/collect";
export { collectCratesStats } from "./tasks/crates/fetch-downloads";
export { collectGithubStats } from "./tasks/github/fetch-releases";
export * from "./tasks/stats/stats.charts";
export * from "./tasks/stats/stats.exports";
export * from "./tasks/stats/stats.reports";
