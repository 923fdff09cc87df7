import { fileURLToPath } from "node:url";

export function getConfigPath(): string {
  return process.env["ANALYTICS_CONFIG_PATH"] ?? "analytics.config.json";
}

/** Tool registry shipped with the package. */
export const DEFAULT_REGISTRY_PATH = fileURLToPath(
  new URL("../../config/tools.json", import.meta.url),
);

/** Sample dataset for the bundled SQLite engine. */
export const DEFAULT_SEED_PATH = fileURLToPath(new URL("../../data/seed.sql", import.meta.url));
