import inquirer from "inquirer";
import { Command } from "commander";
import { configPathOption, getCommandContext, requireMachine, type CommandContext } from "../lib/command-context";
import { AUTO_STOP_DEFER_HOURS_TAG } from "../lib/constants";
import { evaluateRuntime, parseDeferHours } from "../lib/controller";
import { CliError } from "../lib/errors";
import { formatDuration } from "../lib/format";
import { formatHours, roundTo } from "../lib/utils";

export interface DeferOptions {
  add?: boolean;
}

export function registerDeferCommand(program: Command): void {
  program
    .command("defer [hours]")
    .description("Extend the fail-safe threshold for the current running period")
    .option("--add", "Add to the current deferral instead of replacing it")
    .action(async (hours: string | undefined, options: DeferOptions) => {
      const context = getCommandContext({ configPath: configPathOption(program) });
      await runDefer(context, hours, options);
    });
}

export async function runDefer(context: CommandContext, hours: string | undefined, options: DeferOptions = {}): Promise<void> {
  const { machineId, baseStopAfterHours } = context.config;
  const record = await requireMachine(context);

  if (record.state !== "running") {
    console.log(`Machine '${machineId}' is ${record.state}; a deferral only applies while it runs.`);
    return;
  }

  const current = parseDeferHours(record.tags[AUTO_STOP_DEFER_HOURS_TAG]);
  const requested = hours !== undefined ? parseDeferInput(hours) : await promptDeferHours(current, options.add === true);
  const next = roundTo(options.add ? current + requested : requested, 2);

  await context.tags.merge(machineId, { [AUTO_STOP_DEFER_HOURS_TAG]: String(next) });

  const evaluation = evaluateRuntime(
    { ...record, tags: { ...record.tags, [AUTO_STOP_DEFER_HOURS_TAG]: String(next) } },
    baseStopAfterHours,
    context.clock()
  );
  console.log(
    `Updated '${machineId}': deferral ${formatHours(next)}, fail-safe at ${formatHours(evaluation.thresholdHours)} ` +
      `(${formatDuration(evaluation.remainingHours)} left).`
  );
}

export function parseDeferInput(raw: string): number {
  const value = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(value) || value < 0) {
    throw new CliError({
      kind: "validation",
      message: `Deferral must be a non-negative number of hours, got '${raw}'.`
    });
  }
  return value;
}

async function promptDeferHours(current: number, adding: boolean): Promise<number> {
  if (!process.stdout.isTTY) {
    throw new CliError({
      kind: "validation",
      message: "Specify the deferral in hours in non-interactive mode, e.g. `devbox defer 2`."
    });
  }

  const answer = await inquirer.prompt<{ hours: string }>([
    {
      type: "input",
      name: "hours",
      message: adding
        ? `Hours to add to the current deferral (${formatHours(current)}):`
        : `Deferral for this running period in hours (currently ${formatHours(current)}):`,
      default: adding ? "1" : String(current),
      validate: (input: string) => {
        try {
          parseDeferInput(input);
          return true;
        } catch (error) {
          return error instanceof Error ? error.message : String(error);
        }
      }
    }
  ]);
  return parseDeferInput(answer.hours);
}
