import { Cli } from "clipanion";
import { AskCommand } from "./commands/ask.js";
import { ChatCommand } from "./commands/chat.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ServeCommand } from "./commands/serve.js";
import { StatusCommand } from "./commands/status.js";
import { ToolsListCommand } from "./commands/tools.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Analytics",
    binaryName: "analytics",
    binaryVersion: "0.1.0",
  });

  cli.register(ServeCommand);
  cli.register(ChatCommand);
  cli.register(AskCommand);

  cli.register(ToolsListCommand);
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
