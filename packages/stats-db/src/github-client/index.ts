export { GitHubClient } from "./client";
export type { GitHubClientOptions } from "./client";
export type { Release, ReleaseAsset, ReleaseSource } from "./types";
