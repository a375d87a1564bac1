import { Command } from "commander";
import { configPathOption } from "../lib/command-context";
import { loadConfig } from "../lib/config";
import { ensureWatchDaemonRunning, readWatchDaemonPid, runWatchDaemonLoop } from "../lib/watch";

interface WatchOptions {
  background?: boolean;
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch")
    .description("Run the watcher: state tracking, periodic fail-safe checks and the start/stop schedule")
    .option("--background", "Run the watcher as a detached background process")
    .action(async (options: WatchOptions) => {
      const configPath = configPathOption(program);
      // Surface configuration problems here rather than in a detached process.
      const config = loadConfig({ filePath: configPath });

      if (!options.background) {
        await runWatchDaemonLoop(configPath);
        return;
      }

      const started = await ensureWatchDaemonRunning(configPath);
      if (started) {
        console.log(`Watcher started in the background for '${config.machineId}'.`);
        return;
      }
      const pid = await readWatchDaemonPid();
      console.log(`Watcher already running${pid ? ` (pid ${pid})` : ""}.`);
    });
}
