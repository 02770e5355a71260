import { Octokit } from "@octokit/rest";
import type { Release, ReleaseSource } from "./types";

const PER_PAGE = 100;

export interface GitHubClientOptions {
  /** Personal access token; unauthenticated requests when empty. */
  authToken?: string;
  userAgent?: string;
  /** Transport override, e.g. a stub in tests. */
  fetch?: typeof fetch;
}

export class GitHubClient implements ReleaseSource {
  private octokit: Octokit;

  constructor(options: GitHubClientOptions = {}) {
    this.octokit = new Octokit({
      auth: options.authToken || undefined,
      userAgent: options.userAgent ?? "download-stats-collector",
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  /**
   * Fetches every release of a repository. Old releases keep getting
   * downloads, so all pages are read, not just the most recent one.
   */
  async fetchReleases(owner: string, repo: string): Promise<Release[]> {
    const releases = await this.octokit.paginate(
      this.octokit.rest.repos.listReleases,
      {
        owner,
        repo,
        per_page: PER_PAGE,
      }
    );

    return releases.map((release) => ({
      tagName: release.tag_name,
      assets: release.assets.map((asset) => ({
        name: asset.name,
        downloadCount: asset.download_count,
      })),
    }));
  }
}
