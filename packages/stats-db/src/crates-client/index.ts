export { CratesIoClient, CRATES_IO_API_BASE } from "./client";
export type { CratesIoClientOptions } from "./client";
export type {
  CrateDownloads,
  CrateMetadata,
  CratesRegistry,
  ExtraDownload,
  VersionDownload,
} from "./types";
