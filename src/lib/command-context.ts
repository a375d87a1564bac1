import type { Command } from "commander";
import { systemClock, type Clock } from "./clock";
import { loadConfig } from "./config";
import type { ControllerDeps } from "./controller";
import { CliError } from "./errors";
import { createConsoleLogger, type Logger } from "./log";
import { createEc2Client, Ec2MachineBackend } from "./machines";
import { createNotifier } from "./notify";
import type { DevboxConfig, MachineRecord } from "./types";

export interface CommandContext extends ControllerDeps {
  config: DevboxConfig;
}

export interface CommandContextOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  clock?: Clock;
}

export function getCommandContext(options: CommandContextOptions = {}): CommandContext {
  const config = loadConfig({ env: options.env, filePath: options.configPath });
  return createRuntime(config, options);
}

export function createRuntime(config: DevboxConfig, options: Omit<CommandContextOptions, "configPath" | "env"> = {}): CommandContext {
  const logger = options.logger ?? createConsoleLogger("controller");
  let backend: Ec2MachineBackend;
  try {
    backend = new Ec2MachineBackend(createEc2Client(config.region));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError({
      kind: "dependency",
      message: `Unable to create the EC2 client: ${message}`,
      hint: "Check AWS_REGION / DEVBOX_REGION and your AWS credentials."
    });
  }

  return {
    config,
    machines: backend,
    tags: backend,
    notifier: createNotifier({ ...config.notify, logger: options.logger ?? createConsoleLogger("notify") }),
    clock: options.clock ?? systemClock,
    logger
  };
}

export function configPathOption(program: Command): string | undefined {
  return program.opts<{ config?: string }>().config;
}

export function formatMachineNotFoundMessage(machineId: string, region: string): string {
  return `Machine '${machineId}' not found in ${region}.`;
}

export async function requireMachine(context: Pick<CommandContext, "config" | "machines">): Promise<MachineRecord> {
  const { machineId, region } = context.config;
  const record = await context.machines.describe(machineId);
  if (!record) {
    throw new CliError({
      kind: "not_found",
      message: formatMachineNotFoundMessage(machineId, region),
      hint: "Check DEVBOX_INSTANCE_ID and DEVBOX_REGION, or run `devbox doctor`."
    });
  }
  return record;
}
