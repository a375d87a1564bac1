import chalk from "chalk";
import { Command } from "commander";
import { configPathOption, getCommandContext } from "../lib/command-context";
import { runFailSafeCheck } from "../lib/controller";
import { CliError } from "../lib/errors";
import { createConsoleLogger } from "../lib/log";

interface CheckOptions {
  json?: boolean;
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Run the fail-safe check once: stop the machine if it has run past its threshold")
    .option("--json", "Print the controller result as JSON")
    .action(async (options: CheckOptions) => {
      const context = getCommandContext({
        configPath: configPathOption(program),
        logger: createConsoleLogger("check")
      });
      const result = await runFailSafeCheck(context);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (result.outcome === "stopped") {
        console.log(chalk.yellow(result.message));
      } else if (result.ok) {
        console.log(chalk.green(result.message));
      }

      if (!result.ok) {
        throw new CliError({
          kind: "not_found",
          message: result.message,
          hint: "Check DEVBOX_INSTANCE_ID and DEVBOX_REGION, or run `devbox doctor`."
        });
      }
    });
}
