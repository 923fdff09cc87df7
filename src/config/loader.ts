import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { AnalyticsConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_REF = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Replaces every `${env:NAME}` reference; an unset variable is an error. */
export function substituteEnv(raw: string): string {
  return raw.replace(ENV_REF, (ref, name: string) => {
    const value = process.env[name];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${name} (referenced as ${ref})`);
    }
    return value;
  });
}

export function parseConfigText(content: string, source: string): AnalyticsConfig {
  const substituted = substituteEnv(content);
  let raw: unknown;
  try {
    raw = JSON.parse(substituted) as unknown;
  } catch (err) {
    throw new Error(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw);
}

/** Reads and validates a config file. Resolves to undefined when the file does not exist. */
export function readConfigFile(path: string): AnalyticsConfig | undefined {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
  return parseConfigText(content, path);
}

/** Missing file means all defaults. */
export function loadConfig(path?: string): AnalyticsConfig {
  return readConfigFile(resolve(path ?? getConfigPath())) ?? parseConfig({});
}
