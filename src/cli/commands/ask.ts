import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { AnalyticsError } from "../../errors.js";
import { describeResult } from "../../tools/result.js";
import { connect } from "../connect.js";

export class AskCommand extends Command {
  static override paths = [["ask"]];

  static override usage = Command.Usage({
    description: "Log in, ask one question and print the answer",
    examples: [
      ["Ask as the analyst user", 'analytics ask --user analyst@example.com "Show me sales trends for the last 6 months"'],
      ["Use running servers", 'analytics ask --remote --user manager@example.com "Who are our top 10 customers?"'],
    ],
  });

  message = Option.String({ name: "message", required: true });

  user = Option.String("--user,-u", { description: "Username", required: true });

  password = Option.String("--password,-p", {
    description: "Password (defaults to $ANALYTICS_PASSWORD)",
    required: false,
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  remote = Option.Boolean("--remote", false, {
    description: "Talk to running services instead of starting them in-process",
  });

  json = Option.Boolean("--json", false, { description: "Print the answer and tool results as JSON" });

  verbose = Option.Boolean("--verbose,-v", false, { description: "Log every hop to the console" });

  async execute(): Promise<number> {
    const password = this.password ?? process.env["ANALYTICS_PASSWORD"];
    if (!password) {
      this.context.stderr.write("A password is required (--password or ANALYTICS_PASSWORD)\n");
      return 1;
    }

    const config = loadConfig(this.config);
    const connection = connect(config, { remote: this.remote, verbose: this.verbose });
    try {
      await connection.session.login(this.user, password);
      const outcome = await connection.session.ask(this.message);

      if (this.json) {
        this.context.stdout.write(`${JSON.stringify(outcome, null, 2)}\n`);
      } else {
        for (const result of outcome.toolResults) {
          this.context.stdout.write(`[${describeResult(result)}]\n`);
        }
        this.context.stdout.write(`${outcome.text}\n`);
      }
      await connection.session.logout();
      return 0;
    } catch (err) {
      if (!(err instanceof AnalyticsError)) throw err;
      this.context.stderr.write(`${err.message}\n`);
      return 1;
    } finally {
      connection.close();
    }
  }
}
