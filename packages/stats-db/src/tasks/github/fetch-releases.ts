import { GithubSource } from "../../config";
import { Release, ReleaseSource } from "../../github-client";
import { GithubSnapshotRecord } from "../../types";

export interface GithubCollectResult {
  releases: number;
  assets: number;
  downloads: number;
}

/**
 * Records today's cumulative download count for every asset of every
 * matching release. Re-running on the same day overwrites the snapshot.
 */
export async function collectGithubStats(
  store: { putGithubSnapshots(records: GithubSnapshotRecord[]): Promise<void> },
  client: ReleaseSource,
  today: string,
  source: GithubSource
): Promise<GithubCollectResult> {
  const { owner, repo, tagPrefix } = source;

  let releases: Release[];
  try {
    releases = await client.fetchReleases(owner, repo);
  } catch (error) {
    throw new Error(`failed to fetch GitHub releases for ${owner}/${repo}`, {
      cause: error,
    });
  }
  console.log(`  📊 Found ${releases.length} releases`);

  const matching = tagPrefix
    ? releases.filter((release) => release.tagName.startsWith(tagPrefix))
    : releases;

  const records: GithubSnapshotRecord[] = matching.flatMap((release) =>
    release.assets.map((asset) => ({
      date: today,
      releaseTag: release.tagName,
      assetName: asset.name,
      downloadCount: asset.downloadCount,
    }))
  );

  await store.putGithubSnapshots(records);

  const downloads = records.reduce((sum, r) => sum + r.downloadCount, 0);
  console.log(
    `  ✅ Recorded ${records.length} assets with ${downloads.toLocaleString("en-US")} total downloads`
  );

  return { releases: matching.length, assets: records.length, downloads };
}
