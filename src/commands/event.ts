import chalk from "chalk";
import { Command } from "commander";
import { configPathOption, getCommandContext } from "../lib/command-context";
import { classifyEvent, handleLifecycleEvent } from "../lib/controller";
import { CliError } from "../lib/errors";
import { createConsoleLogger } from "../lib/log";
import type { LifecycleEvent } from "../lib/types";

interface EventOptions {
  state?: string;
  instanceId?: string;
  payload?: string;
}

export function registerEventCommand(program: Command): void {
  program
    .command("event")
    .description("Feed a lifecycle event to the controller (state change or raw trigger payload)")
    .option("--state <state>", "Machine state the instance transitioned to, e.g. running")
    .option("--instance-id <id>", "Instance the state change belongs to (defaults to the configured machine)")
    .option("--payload <json>", "Raw trigger payload, classified the way the serverless handler does")
    .action(async (options: EventOptions) => {
      const event = resolveEvent(options);
      const context = getCommandContext({
        configPath: configPathOption(program),
        logger: createConsoleLogger("event")
      });

      const result = await handleLifecycleEvent(event, context);
      console.log(result.ok ? chalk.green(result.message) : chalk.red(result.message));
      if (!result.ok) {
        process.exitCode = 1;
      }
    });
}

export function resolveEvent(options: EventOptions): LifecycleEvent {
  if (options.payload !== undefined && options.state !== undefined) {
    throw new CliError({
      kind: "validation",
      message: "Choose either --state or --payload, not both."
    });
  }

  if (options.payload !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(options.payload);
    } catch (error) {
      throw new CliError({
        kind: "validation",
        message: "--payload must be valid JSON.",
        detail: error instanceof Error ? error.message : String(error)
      });
    }
    return classifyEvent(parsed);
  }

  if (options.state !== undefined) {
    return { kind: "state-changed", state: options.state.trim(), machineId: options.instanceId };
  }

  throw new CliError({
    kind: "validation",
    message: "Provide --state <state> or --payload <json>.",
    hint: "Use `devbox check` to run the periodic fail-safe check."
  });
}
