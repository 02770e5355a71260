import { cleanEnv, str } from "envalid";

const env = cleanEnv(process.env, {
  STATS_DB_PATH: str({ default: "download-stats.db" }),
  STATS_CONFIG_PATH: str({ default: "config.toml" }),
  GITHUB_TOKEN: str({ default: "" }),
  STATS_USER_AGENT: str({ default: "download-stats-collector" }),
});

export default env;
