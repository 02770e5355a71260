import { readFileSync } from "fs";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError } from "./errors";

const githubSourceSchema = z.object({
  kind: z.literal("github"),
  owner: z.string().min(1),
  repo: z.string().min(1),
  // Only releases whose tag starts with this prefix are collected
  tag_prefix: z.string().optional(),
});

const cratesSourceSchema = z.object({
  kind: z.literal("crates"),
  name: z.string().min(1),
});

const configSchema = z.object({
  source: z
    .array(z.discriminatedUnion("kind", [githubSourceSchema, cratesSourceSchema]))
    .default([]),
});

export interface GithubSource {
  owner: string;
  repo: string;
  tagPrefix?: string;
}

export class StatsConfig {
  readonly githubSources: GithubSource[];
  readonly cratesSources: string[];

  constructor(sources: z.infer<typeof configSchema>["source"]) {
    this.githubSources = [];
    this.cratesSources = [];

    for (const source of sources) {
      switch (source.kind) {
        case "github":
          this.githubSources.push({
            owner: source.owner,
            repo: source.repo,
            tagPrefix: source.tag_prefix,
          });
          break;
        case "crates":
          this.cratesSources.push(source.name);
          break;
      }
    }
  }

  /** The tag prefix configured for any GitHub source, used to read versions. */
  get tagPrefixes(): string[] {
    return this.githubSources
      .map((source) => source.tagPrefix)
      .filter((prefix): prefix is string => !!prefix);
  }

  static parse(content: string, path: string): StatsConfig {
    let raw: unknown;
    try {
      raw = parseToml(content);
    } catch (error) {
      throw new ConfigError("failed to parse config file", path, error);
    }

    const result = configSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`invalid config file (${issues})`, path);
    }

    return new StatsConfig(result.data.source);
  }

  static load(path: string): StatsConfig {
    let content: string;
    try {
      content = readFileSync(path, "utf8");
    } catch (error) {
      throw new ConfigError("failed to read config file", path, error);
    }
    return StatsConfig.parse(content, path);
  }
}
