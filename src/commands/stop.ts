import ora from "ora";
import { Command } from "commander";
import { configPathOption, getCommandContext, requireMachine, type CommandContext } from "../lib/command-context";
import { AUTO_STOP_DEFER_HOURS_TAG, CLI_NAME } from "../lib/constants";

export function registerStopCommand(program: Command): void {
  program
    .command("stop")
    .description("Stop the dev machine and clear any deferral")
    .action(async () => {
      const context = getCommandContext({ configPath: configPathOption(program) });
      await runStop(context);
    });
}

export async function runStop(context: CommandContext): Promise<void> {
  const { machineId } = context.config;
  const record = await requireMachine(context);

  if (record.state !== "running" && record.state !== "pending") {
    console.log(`Machine '${machineId}' is already ${record.state}.`);
    return;
  }

  const spinner = ora(`Stopping '${machineId}'...`).start();
  try {
    await context.machines.stop(machineId);
    await context.tags.merge(machineId, { [AUTO_STOP_DEFER_HOURS_TAG]: "0" });
    spinner.succeed(`Stop requested for '${machineId}'.`);
  } catch (error) {
    spinner.fail("Stop failed.");
    throw error;
  }

  console.log(`Disk is preserved. Resume anytime with \`${CLI_NAME} start\`.`);
}
