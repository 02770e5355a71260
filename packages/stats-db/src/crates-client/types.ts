import { z } from "zod";

export const versionDownloadSchema = z.object({
  /** Numeric version id, not the semver string */
  version: z.number().int(),
  downloads: z.number().int().nonnegative(),
  date: z.string(),
});

export const extraDownloadSchema = z.object({
  date: z.string(),
  downloads: z.number().int().nonnegative(),
});

export const downloadsResponseSchema = z.object({
  version_downloads: z.array(versionDownloadSchema),
  meta: z.object({
    extra_downloads: z.array(extraDownloadSchema),
  }),
});

export const crateResponseSchema = z.object({
  crate: z.object({
    downloads: z.number().int().nonnegative(),
    recent_downloads: z.number().int().nonnegative().nullish(),
  }),
});

export interface VersionDownload {
  version: number;
  downloads: number;
  date: string;
}

export interface ExtraDownload {
  date: string;
  downloads: number;
}

export interface CrateDownloads {
  versionDownloads: VersionDownload[];
  /** Downloads of versions that have no rows of their own */
  extraDownloads: ExtraDownload[];
}

export interface CrateMetadata {
  downloads: number;
  recentDownloads: number;
}

/** What the collectors need from crates.io. */
export interface CratesRegistry {
  fetchDownloads(crateName: string): Promise<CrateDownloads>;
  fetchCrateMetadata(crateName: string): Promise<CrateMetadata>;
}
