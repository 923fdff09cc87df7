import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { AnalyticsConfig } from "../../config/types.js";

const REDACTED = "***REDACTED***";

export function redactConfig(config: AnalyticsConfig): AnalyticsConfig {
  return {
    ...config,
    identity: {
      ...config.identity,
      signingSecret: REDACTED,
      users: config.identity.users.map((user) => ({ ...user, password: REDACTED })),
    },
    executor: { ...config.executor, internalKey: REDACTED },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (secrets redacted)",
    examples: [["Show config", "analytics config show"]],
  });

  async execute(): Promise<void> {
    let config: AnalyticsConfig;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "analytics config validate"],
      ["Validate specific file", "analytics config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let config: AnalyticsConfig | undefined;
    try {
      config = readConfigFile(configPath);
    } catch (err) {
      this.context.stdout.write(
        `Config is invalid: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    if (!config) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(`Config is valid: ${configPath}\n`);
    this.context.stdout.write(`  users: ${config.identity.users.length}\n`);
  }
}
