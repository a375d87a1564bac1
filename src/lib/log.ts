import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(scope: string): Logger {
  const prefix = chalk.dim(`[${scope}]`);
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.log(`${prefix} ${chalk.yellow(message)}`),
    error: (message) => console.error(`${prefix} ${chalk.red(message)}`)
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
