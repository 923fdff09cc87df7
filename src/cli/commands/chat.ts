import { Command, Option } from "clipanion";
import { createInterface, type Interface } from "node:readline/promises";
import type { AgentChunk } from "../../agent/types.js";
import { loadConfig } from "../../config/loader.js";
import { AnalyticsError, SessionExpiredError, TokenRejectedError } from "../../errors.js";
import { describeResult } from "../../tools/result.js";
import type { ChatSession } from "../../ui/chat-session.js";
import { QUICK_QUERIES } from "../../ui/quick-queries.js";
import { connect } from "../connect.js";

const COMMANDS = "Commands: /quick, /logout, /quit. Enter a number to run a quick query.";

export class ChatCommand extends Command {
  static override paths = [["chat"]];

  static override usage = Command.Usage({
    description: "Interactive conversation with the analytics agent",
    details: "Ctrl+C stops the answer in progress; pressed while idle it exits.",
    examples: [
      ["Chat in-process", "analytics chat"],
      ["Chat with running services", "analytics chat --remote --user analyst@example.com"],
    ],
  });

  user = Option.String("--user,-u", { description: "Username", required: false });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  remote = Option.Boolean("--remote", false, {
    description: "Talk to running services instead of starting them in-process",
  });

  verbose = Option.Boolean("--verbose,-v", false, { description: "Log every hop to the console" });

  private asking = false;
  private readonly closed = new AbortController();

  async execute(): Promise<number> {
    const config = loadConfig(this.config);
    const connection = connect(config, { remote: this.remote, verbose: this.verbose });
    const rl = createInterface({ input: this.context.stdin, output: this.context.stdout });
    const { session } = connection;

    rl.on("close", () => this.closed.abort());
    rl.on("SIGINT", () => {
      if (this.asking) {
        session.cancel();
      } else {
        rl.close();
      }
    });

    try {
      await this.loop(rl, session);
      return 0;
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") return 0;
      throw err;
    } finally {
      if (!session.needsLogin) await session.logout();
      rl.close();
      connection.close();
    }
  }

  private write(text: string): void {
    this.context.stdout.write(text);
  }

  private async login(rl: Interface, session: ChatSession): Promise<void> {
    while (session.needsLogin) {
      const username = this.user ?? (await rl.question("Username: ", { signal: this.closed.signal }));
      const password = await rl.question("Password: ", { signal: this.closed.signal });
      try {
        await session.login(username.trim(), password);
      } catch (err) {
        if (!(err instanceof AnalyticsError)) throw err;
        this.write(`${err.message}\n`);
      }
    }

    const greeting = session.history()[0];
    if (greeting) this.write(`\n${greeting.content}\n`);
    this.printQuickQueries();
  }

  private printQuickQueries(): void {
    this.write("\nQuick queries:\n");
    QUICK_QUERIES.forEach((query, index) => this.write(`  ${index + 1}. ${query}\n`));
    this.write(`${COMMANDS}\n\n`);
  }

  private async loop(rl: Interface, session: ChatSession): Promise<void> {
    await this.login(rl, session);

    for (;;) {
      const line = (await rl.question("> ", { signal: this.closed.signal })).trim();
      if (!line) continue;
      if (line === "/quit") return;
      if (line === "/quick") {
        this.printQuickQueries();
        continue;
      }
      if (line === "/logout") {
        await session.logout();
        this.write("Logged out.\n");
        await this.login(rl, session);
        continue;
      }

      const quick = /^\d+$/.test(line) ? QUICK_QUERIES[Number(line) - 1] : undefined;
      const message = quick ?? line;
      if (quick) this.write(`${quick}\n`);

      this.asking = true;
      try {
        const outcome = await session.ask(message, { onChunk: (chunk) => this.render(chunk) });
        if (outcome.status === "cancelled") this.write("\n(cancelled)\n");
        this.write("\n");
      } catch (err) {
        if (err instanceof SessionExpiredError || err instanceof TokenRejectedError) {
          this.write(`\n${err.message}\n`);
          await this.login(rl, session);
        } else if (err instanceof AnalyticsError) {
          this.write(`\nError: ${err.message}\n`);
        } else {
          throw err;
        }
      } finally {
        this.asking = false;
      }
    }
  }

  private render(chunk: AgentChunk): void {
    switch (chunk.type) {
      case "text":
        this.write(`${chunk.text}\n`);
        break;
      case "tool_call":
        this.write(`[calling ${chunk.toolName}]\n`);
        break;
      case "tool_result":
        this.write(`[${describeResult(chunk.result)}]\n`);
        break;
      case "error":
        this.write(`Error: ${chunk.message}\n`);
        break;
      case "done":
        break;
    }
  }
}
