import { Command, Option } from "clipanion";
import { DEFAULT_REGISTRY_PATH } from "../../config/paths.js";
import { loadConfig } from "../../config/loader.js";
import { ToolRegistry } from "../../tools/registry.js";

export class ToolsListCommand extends Command {
  static override paths = [["tools", "list"]];

  static override usage = Command.Usage({
    description: "List registry tools, optionally only those a role may call",
    examples: [
      ["List every tool", "analytics tools list"],
      ["Tools an analyst may call", "analytics tools list --role analyst"],
    ],
  });

  role = Option.String("--role", { description: "Only tools visible to this role", required: false });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number> {
    const config = loadConfig(this.config);
    const registry = ToolRegistry.load(config.registry.path ?? DEFAULT_REGISTRY_PATH);
    const tools = this.role ? registry.visibleTo(this.role) : registry.list();

    if (tools.length === 0) {
      this.context.stdout.write("No tools available.\n");
      return 0;
    }

    for (const tool of tools) {
      const roles = tool.allowedRoles ? tool.allowedRoles.join(", ") : "all roles";
      const args = Object.keys(tool.inputSchema.properties);
      this.context.stdout.write(`${tool.name} (${roles})\n`);
      this.context.stdout.write(`  ${tool.description}\n`);
      if (args.length > 0) {
        this.context.stdout.write(`  arguments: ${args.join(", ")}\n`);
      }
    }
    return 0;
  }
}
