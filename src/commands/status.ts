import chalk from "chalk";
import { Command } from "commander";
import { configPathOption, getCommandContext, requireMachine } from "../lib/command-context";
import { AUTO_STOP_DEFER_HOURS_TAG, LAST_STARTED_AT_TAG } from "../lib/constants";
import { evaluateRuntime, type RuntimeEvaluation } from "../lib/controller";
import { formatDuration, formatTimestamp, renderDetails } from "../lib/format";
import { describeSchedule, validateSchedule } from "../lib/schedule";
import type { DevboxConfig, MachineRecord } from "../lib/types";
import { formatHours } from "../lib/utils";

interface StatusOptions {
  json?: boolean;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the dev machine's state and remaining fail-safe budget")
    .option("--json", "Print the status as JSON")
    .action(async (options: StatusOptions) => {
      const context = getCommandContext({ configPath: configPathOption(program) });
      const record = await requireMachine(context);
      const now = context.clock();
      const evaluation = record.state === "running" ? tryEvaluate(record, context.config, now) : undefined;

      if (options.json) {
        console.log(JSON.stringify({ ...record, evaluation: evaluation ?? null }, null, 2));
        return;
      }

      console.log(renderStatus(record, context.config, evaluation, now));
    });
}

export function renderStatus(
  record: MachineRecord,
  config: DevboxConfig,
  evaluation: RuntimeEvaluation | undefined,
  now: Date
): string {
  const state = record.state === "running" ? chalk.green(record.state) : chalk.yellow(record.state);
  const rows: Array<[string, string]> = [
    ["machine", record.id],
    ["region", config.region],
    ["state", state],
    ["launched", formatTimestamp(record.launchedAt)],
    ["last started", record.tags[LAST_STARTED_AT_TAG] ?? "-"],
    ["deferral", record.tags[AUTO_STOP_DEFER_HOURS_TAG] ?? "-"]
  ];

  if (evaluation) {
    rows.push(
      ["uptime", formatDuration(evaluation.elapsedHours)],
      ["fail-safe at", `${formatHours(evaluation.thresholdHours)} (base ${formatHours(config.baseStopAfterHours)})`],
      ["remaining", formatDuration(evaluation.remainingHours)]
    );
  }

  const schedule = validateSchedule(config.schedule).length === 0 ? describeSchedule(config.schedule, now) : [];
  for (const entry of schedule) {
    rows.push([`scheduled ${entry.action}`, `${entry.expression} (${config.schedule.timeZone}), next ${formatTimestamp(entry.nextRun ?? undefined)}`]);
  }

  return renderDetails(rows);
}

function tryEvaluate(record: MachineRecord, config: DevboxConfig, now: Date): RuntimeEvaluation | undefined {
  try {
    return evaluateRuntime(record, config.baseStopAfterHours, now);
  } catch {
    // No usable start time; the rows fall back to "-".
    return undefined;
  }
}
