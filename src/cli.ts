#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerCheckCommand } from "./commands/check";
import { registerDeferCommand } from "./commands/defer";
import { registerDoctorCommand } from "./commands/doctor";
import { registerEventCommand } from "./commands/event";
import { registerStartCommand } from "./commands/start";
import { registerStatusCommand } from "./commands/status";
import { registerStopCommand } from "./commands/stop";
import { registerWatchCommand } from "./commands/watch";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";
import { runWatchDaemonLoop } from "./lib/watch";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

if (normalizedArgv[2] === "__watchd") {
  runWatchDaemonLoop().catch((error: unknown) => {
    const cliError = toCliError(error);
    console.error(chalk.red(renderCliError(cliError)));
    process.exitCode = cliError.exitCode;
  });
} else {
  program
    .name(CLI_NAME)
    .description(pkg.description ?? "Lifecycle controller for a single EC2 dev machine")
    .version(pkg.version ?? "0.0.0", "--version", "output the version number")
    .option("-c, --config <path>", "config file (default: $DEVBOX_CONFIG or ~/.devbox/config.json)");

  registerStatusCommand(program);
  registerStartCommand(program);
  registerStopCommand(program);
  registerDeferCommand(program);
  registerCheckCommand(program);
  registerEventCommand(program);
  registerWatchCommand(program);
  registerDoctorCommand(program);

  program.parseAsync(normalizedArgv).catch((error: unknown) => {
    const cliError = toCliError(error);
    console.error(chalk.red(renderCliError(cliError)));
    process.exitCode = cliError.exitCode;
  });
}
