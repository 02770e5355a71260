import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import {
  CrateDownloads,
  CrateMetadata,
  crateResponseSchema,
  CratesRegistry,
  downloadsResponseSchema,
} from "./types";

export const CRATES_IO_API_BASE = "https://crates.io/api/v1";

export interface CratesIoClientOptions {
  restEndpoint?: string;
  /** crates.io rejects requests without a descriptive User-Agent. */
  userAgent: string;
  adapter?: AxiosAdapter;
}

export class CratesIoClient implements CratesRegistry {
  private http: AxiosInstance;

  constructor(options: CratesIoClientOptions) {
    this.http = axios.create({
      baseURL: options.restEndpoint ?? CRATES_IO_API_BASE,
      headers: { "User-Agent": options.userAgent },
      // Status codes are checked below so the body can go into the error
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  private async get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    crateName: string
  ): Promise<T> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path);
    } catch (error) {
      throw new Error(`failed to fetch ${path} for crate '${crateName}'`, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      const body =
        typeof response.data === "string"
          ? response.data
          : JSON.stringify(response.data ?? "");
      throw new Error(
        `crates.io API request failed with status ${response.status} for crate '${crateName}': ${body}`
      );
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(
        `failed to parse crates.io API response for crate '${crateName}'`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Daily downloads per version. crates.io only serves recent history.
   */
  async fetchDownloads(crateName: string): Promise<CrateDownloads> {
    const data = await this.get(
      `/crates/${encodeURIComponent(crateName)}/downloads`,
      downloadsResponseSchema,
      crateName
    );

    return {
      versionDownloads: data.version_downloads,
      extraDownloads: data.meta.extra_downloads,
    };
  }

  /** Cumulative totals for a crate. */
  async fetchCrateMetadata(crateName: string): Promise<CrateMetadata> {
    const data = await this.get(
      `/crates/${encodeURIComponent(crateName)}`,
      crateResponseSchema,
      crateName
    );

    return {
      downloads: data.crate.downloads,
      recentDownloads: data.crate.recent_downloads ?? 0,
    };
  }
}
