import { describe, expect, it } from "vitest";
import { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { CratesIoClient } from "../src/crates-client";

interface StubResponse {
  status: number;
  data: unknown;
}

function stubAdapter(
  routes: Record<string, StubResponse>,
  seen: InternalAxiosRequestConfig[] = []
): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    const route = routes[config.url ?? ""];
    if (!route) {
      throw new Error(`no stub for ${config.url}`);
    }
    const response: AxiosResponse = {
      data: route.data,
      status: route.status,
      statusText: "",
      headers: {},
      config,
    };
    return response;
  };
}

const USER_AGENT = "download-stats-tests";

describe("CratesIoClient", () => {
  it("should map daily downloads and send the user agent", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter(
        {
          "/crates/sample-crate/downloads": {
            status: 200,
            data: {
              version_downloads: [
                { version: 101, downloads: 40, date: "2025-11-17" },
                { version: 102, downloads: 60, date: "2025-11-17" },
              ],
              meta: { extra_downloads: [{ date: "2025-11-17", downloads: 5 }] },
            },
          },
        },
        seen
      ),
    });

    expect(await client.fetchDownloads("sample-crate")).toEqual({
      versionDownloads: [
        { version: 101, downloads: 40, date: "2025-11-17" },
        { version: 102, downloads: 60, date: "2025-11-17" },
      ],
      extraDownloads: [{ date: "2025-11-17", downloads: 5 }],
    });
    expect(seen).toHaveLength(1);
    expect(seen[0].baseURL).toBe("https://crates.io/api/v1");
    expect(seen[0].headers.get("User-Agent")).toBe(USER_AGENT);
  });

  it("should read crate metadata", async () => {
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter({
        "/crates/sample-crate": {
          status: 200,
          data: { crate: { downloads: 12345, recent_downloads: 678, name: "sample-crate" } },
        },
      }),
    });

    expect(await client.fetchCrateMetadata("sample-crate")).toEqual({
      downloads: 12345,
      recentDownloads: 678,
    });
  });

  it("should treat missing recent downloads as zero", async () => {
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter({
        "/crates/sample-crate": {
          status: 200,
          data: { crate: { downloads: 10, recent_downloads: null } },
        },
      }),
    });

    expect(await client.fetchCrateMetadata("sample-crate")).toEqual({
      downloads: 10,
      recentDownloads: 0,
    });
  });

  it("should include the status and body of a failed request", async () => {
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter({
        "/crates/missing-crate/downloads": {
          status: 404,
          data: { errors: [{ detail: "Not Found" }] },
        },
      }),
    });

    await expect(client.fetchDownloads("missing-crate")).rejects.toThrow(
      `crates.io API request failed with status 404 for crate 'missing-crate': {"errors":[{"detail":"Not Found"}]}`
    );
  });

  it("should reject a malformed body", async () => {
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter({
        "/crates/sample-crate/downloads": {
          status: 200,
          data: { version_downloads: "nope" },
        },
      }),
    });

    await expect(client.fetchDownloads("sample-crate")).rejects.toThrow(
      "failed to parse crates.io API response for crate 'sample-crate'"
    );
  });

  it("should wrap transport errors with the request path", async () => {
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      adapter: stubAdapter({}),
    });

    await expect(client.fetchCrateMetadata("sample-crate")).rejects.toThrow(
      "failed to fetch /crates/sample-crate for crate 'sample-crate'"
    );
  });

  it("should honour a custom endpoint", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new CratesIoClient({
      userAgent: USER_AGENT,
      restEndpoint: "http://registry.test/api/v1",
      adapter: stubAdapter(
        { "/crates/sample-crate": { status: 200, data: { crate: { downloads: 1 } } } },
        seen
      ),
    });

    await client.fetchCrateMetadata("sample-crate");
    expect(seen[0].baseURL).toBe("http://registry.test/api/v1");
  });
});
