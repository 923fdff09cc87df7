import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
import { SERVICE_NAMES, type ServiceName } from "../../stack/factory.js";
import { startStack } from "../../stack/lifecycle.js";
import { printBanner } from "../banner.js";

const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };

function isServiceName(value: string): value is ServiceName {
  return SERVICE_NAMES.some((name) => name === value);
}

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the identity, executor, gateway and runtime services",
    examples: [
      ["Start everything with the default config", "analytics serve"],
      ["Start only the gateway and executor", "analytics serve --service gateway --service executor"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  services = Option.Array("--service", {
    description: `Service to run (${SERVICE_NAMES.join(", ")}); repeatable`,
  });

  async execute(): Promise<number> {
    const requested = this.services ?? [...SERVICE_NAMES];
    const unknown = requested.filter((name) => !isServiceName(name));
    if (unknown.length > 0) {
      this.context.stderr.write(`Unknown service: ${unknown.join(", ")}\n`);
      return 1;
    }

    printBanner(pkg.version, (text) => this.context.stdout.write(text));
    try {
      await startStack({
        configPath: this.config,
        services: requested.filter(isServiceName),
        handleSignals: true,
      });
    } catch (err) {
      this.context.stderr.write(`Failed to start: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
    // Servers keep the process alive until a signal stops them.
    return 0;
  }
}
