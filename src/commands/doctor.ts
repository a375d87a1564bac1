import chalk from "chalk";
import { Command } from "commander";
import { configPathOption } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { runPreflight } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check configuration, schedule and access to the dev machine")
    .action(async () => {
      const report = await runPreflight({ configPath: configPathOption(program) });

      for (const check of report.checks) {
        const symbol = !check.ok ? chalk.red("✖") : check.warning ? chalk.yellow("!") : chalk.green("✔");
        console.log(`${symbol} ${check.message}`);
        if ((!check.ok || check.warning) && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
      }

      if (!report.ok) {
        throw new CliError({
          kind: "dependency",
          message: "Preflight failed.",
          hint: "Resolve the items above, then re-run `devbox doctor`."
        });
      }
    });
}
