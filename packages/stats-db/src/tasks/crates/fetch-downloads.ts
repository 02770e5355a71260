import { parseDay } from "../../aggregate/week";
import { CrateDownloads, CrateMetadata, CratesRegistry } from "../../crates-client";
import { CratesDownloadRecord, CratesMetadataRecord } from "../../types";

const API_TABLE = "crates.io downloads response";

export interface CratesCollectStore {
  putCratesDownloads(records: CratesDownloadRecord[]): Promise<void>;
  putCratesMetadata(record: CratesMetadataRecord): Promise<void>;
}

/**
 * Stores the daily per-version downloads crates.io reports for a crate,
 * the registry-wide "extra" downloads under an empty version, and today's
 * cumulative metadata snapshot.
 */
export async function collectCratesStats(
  store: CratesCollectStore,
  client: CratesRegistry,
  today: string,
  crateName: string
): Promise<number> {
  let downloads: CrateDownloads;
  try {
    downloads = await client.fetchDownloads(crateName);
  } catch (error) {
    throw new Error(`failed to fetch downloads for '${crateName}'`, {
      cause: error,
    });
  }

  const records: CratesDownloadRecord[] = [];

  for (const vd of downloads.versionDownloads) {
    parseDay(vd.date, API_TABLE);
    records.push({
      date: vd.date,
      crateName,
      version: String(vd.version),
      downloads: vd.downloads,
    });
  }

  for (const ed of downloads.extraDownloads) {
    parseDay(ed.date, API_TABLE);
    records.push({
      date: ed.date,
      crateName,
      version: null,
      downloads: ed.downloads,
    });
  }

  await store.putCratesDownloads(records);
  console.log(`    ✅ Inserted ${records.length} records`);

  let metadata: CrateMetadata;
  try {
    metadata = await client.fetchCrateMetadata(crateName);
  } catch (error) {
    throw new Error(`failed to fetch metadata for '${crateName}'`, {
      cause: error,
    });
  }

  await store.putCratesMetadata({
    date: today,
    crateName,
    totalDownloads: metadata.downloads,
    recentDownloads: metadata.recentDownloads,
  });

  return records.length;
}
