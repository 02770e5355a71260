export interface ReleaseAsset {
  name: string;
  downloadCount: number;
}

export interface Release {
  tagName: string;
  assets: ReleaseAsset[];
}

/** What the collectors need from GitHub. */
export interface ReleaseSource {
  fetchReleases(owner: string, repo: string): Promise<Release[]>;
}
