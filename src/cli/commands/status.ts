import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { serviceUrl } from "../../config/schema.js";
import { SERVICE_NAMES } from "../../stack/factory.js";
import { joinUrl, type FetchFn } from "../../utils/http.js";

const PROBE_TIMEOUT_MS = 2_000;

async function probe(fetchFn: FetchFn, url: string): Promise<string> {
  try {
    const res = await fetchFn(joinUrl(url, "/health"), { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
    return res.ok ? "up" : `unhealthy (${res.status})`;
  } catch {
    return "down";
  }
}

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configured endpoints and whether each service answers",
    examples: [["Show status", "analytics status"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  fetchFn: FetchFn = fetch;

  async execute(): Promise<void> {
    const configPath = this.config ?? getConfigPath();

    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(`  Error: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(`Analytics Stack Status\n`);
    this.context.stdout.write(`----------------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`Users:       ${config.identity.users.length}\n`);

    for (const name of SERVICE_NAMES) {
      const url = serviceUrl(config[name]);
      const state = await probe(this.fetchFn, url);
      this.context.stdout.write(`${`${name}:`.padEnd(12)} ${url} ${state}\n`);
    }
  }
}
