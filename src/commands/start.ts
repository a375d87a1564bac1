import chalk from "chalk";
import ora from "ora";
import { Command } from "commander";
import { configPathOption, getCommandContext, requireMachine } from "../lib/command-context";
import { CLI_NAME } from "../lib/constants";
import { CliError } from "../lib/errors";

export function registerStartCommand(program: Command): void {
  program
    .command("start")
    .description("Start the dev machine")
    .action(async () => {
      const context = getCommandContext({ configPath: configPathOption(program) });
      const { machineId, baseStopAfterHours } = context.config;
      const record = await requireMachine(context);

      if (record.state === "running" || record.state === "pending") {
        console.log(`Machine '${machineId}' is already ${record.state}.`);
        return;
      }
      if (record.state === "terminated" || record.state === "shutting-down") {
        throw new CliError({
          kind: "validation",
          message: `Machine '${machineId}' is ${record.state} and cannot be started.`,
          hint: "Provision a new machine and update DEVBOX_INSTANCE_ID."
        });
      }

      const spinner = ora(`Starting '${machineId}'...`).start();
      try {
        await context.machines.start(machineId);
        spinner.succeed(`Start requested for '${machineId}'.`);
      } catch (error) {
        spinner.fail("Start failed.");
        throw error;
      }

      console.log(
        chalk.dim(`The fail-safe stops it after ${baseStopAfterHours}h. Extend with \`${CLI_NAME} defer <hours>\`.`)
      );
    });
}
