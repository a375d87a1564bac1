import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawn } from "node:child_process";
import { createRuntime } from "./command-context";
import { loadConfig } from "./config";
import { WATCH_POLL_SECONDS } from "./constants";
import { handleLifecycleEvent, runFailSafeCheck, type ControllerDeps } from "./controller";
import { createConsoleLogger, type Logger } from "./log";
import { createScheduler, type Scheduler } from "./schedule";
import type { DevboxConfig, LifecycleEvent, MachineState } from "./types";

const DAEMON_PID_PATH = path.join(os.tmpdir(), "devbox-watchd.pid");

export interface WatcherOptions {
  deps: ControllerDeps & { config: DevboxConfig };
  pollSeconds?: number;
}

export interface Watcher {
  poll(): Promise<void>;
  check(): Promise<void>;
  idle(): Promise<void>;
  stop(): void;
}

export interface SerialQueue {
  push(task: () => Promise<void>): Promise<void>;
  idle(): Promise<void>;
}

export type StateChangedEvent = Extract<LifecycleEvent, { kind: "state-changed" }>;

export interface StateTracker {
  observe(state: MachineState): StateChangedEvent | null;
}

/**
 * Runs every trigger the serverless deployment would otherwise provide:
 * polled state changes, the periodic fail-safe check and the fixed-time
 * schedule. All work goes through one queue so controller invocations never
 * overlap.
 */
export function startWatcher(options: WatcherOptions): Watcher {
  const { deps } = options;
  const { config, logger } = deps;
  const pollMs = (options.pollSeconds ?? WATCH_POLL_SECONDS) * 1000;
  const checkMs = config.checkIntervalMinutes * 60_000;

  const queue = createSerialQueue(logger);
  const tracker = createStateTracker();

  const poll = () =>
    queue.push(async () => {
      const record = await deps.machines.describe(config.machineId);
      if (!record) {
        logger.warn(`Machine ${config.machineId} not found while polling state.`);
        return;
      }
      const event = tracker.observe(record.state);
      if (!event) {
        return;
      }
      const result = await handleLifecycleEvent({ ...event, machineId: config.machineId }, deps);
      logger.info(`state change: ${result.message}`);
    });

  const check = () =>
    queue.push(async () => {
      const result = await runFailSafeCheck(deps);
      const line = `periodic check: ${result.message}`;
      if (result.ok) {
        logger.info(line);
      } else {
        logger.error(line);
      }
    });

  let scheduler: Scheduler | undefined;
  if (config.schedule.start || config.schedule.stop) {
    scheduler = createScheduler({
      machineId: config.machineId,
      schedule: config.schedule,
      machines: deps.machines,
      logger,
      enqueue: (task) => queue.push(task)
    });
  }

  void poll();
  void check();
  const pollTimer = setInterval(() => void poll(), pollMs);
  const checkTimer = setInterval(() => void check(), checkMs);
  logger.info(
    `Watching ${config.machineId}: state every ${pollMs / 1000}s, fail-safe every ${config.checkIntervalMinutes}m.`
  );

  return {
    poll,
    check,
    idle: () => queue.idle(),
    stop: () => {
      clearInterval(pollTimer);
      clearInterval(checkTimer);
      scheduler?.stop();
    }
  };
}

export function createSerialQueue(logger: Logger): SerialQueue {
  let tail: Promise<void> = Promise.resolve();
  return {
    push(task) {
      const run = tail.then(task).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`Watcher task failed: ${reason}`);
      });
      tail = run;
      return run;
    },
    idle: () => tail
  };
}

// The first observation only primes the tracker: a restarted watcher must not
// re-stamp LastStartedAt for a machine that was already running.
export function createStateTracker(): StateTracker {
  let last: MachineState | undefined;
  return {
    observe(state) {
      const previous = last;
      last = state;
      if (previous === undefined || previous === state) {
        return null;
      }
      return { kind: "state-changed", state };
    }
  };
}

export async function ensureWatchDaemonRunning(configPath?: string): Promise<boolean> {
  if (await hasLiveDaemon()) {
    return false;
  }

  const entrypoint = resolveCliEntrypoint();
  const child = spawn(process.execPath, [entrypoint, "__watchd"], {
    detached: true,
    stdio: "ignore",
    env: configPath ? { ...process.env, DEVBOX_CONFIG: path.resolve(configPath) } : process.env
  });
  child.unref();
  return true;
}

export async function runWatchDaemonLoop(configPath?: string): Promise<void> {
  const logger = createConsoleLogger("watchd");
  const claimed = await claimDaemonPid();
  if (!claimed) {
    logger.warn("Another devbox watcher is already running.");
    return;
  }

  let watcher: Watcher;
  try {
    const config = loadConfig({ filePath: configPath });
    watcher = startWatcher({ deps: createRuntime(config, { logger }) });
  } catch (error) {
    await clearDaemonPidIfOwned();
    throw error;
  }

  const shutdown = async () => {
    watcher.stop();
    try {
      await watcher.idle();
      await clearDaemonPidIfOwned();
    } catch (error) {
      logger.error(`Watcher shutdown cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
  process.on("SIGHUP", () => void shutdown());
}

export async function readWatchDaemonPid(): Promise<number | undefined> {
  const pid = await readDaemonPid();
  return pid && isProcessAlive(pid) ? pid : undefined;
}

async function hasLiveDaemon(): Promise<boolean> {
  return (await readWatchDaemonPid()) !== undefined;
}

async function claimDaemonPid(): Promise<boolean> {
  const existingPid = await readDaemonPid();
  if (existingPid && existingPid !== process.pid && isProcessAlive(existingPid)) {
    return false;
  }
  await fs.promises.writeFile(DAEMON_PID_PATH, `${process.pid}\n`, "utf8");
  return true;
}

async function clearDaemonPidIfOwned(): Promise<void> {
  const pid = await readDaemonPid();
  if (pid !== process.pid) {
    return;
  }
  try {
    await fs.promises.unlink(DAEMON_PID_PATH);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }
}

async function readDaemonPid(): Promise<number | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(DAEMON_PID_PATH, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed <= 1) {
    return undefined;
  }
  return parsed;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function resolveCliEntrypoint(): string {
  const entrypoint = process.argv[1];
  if (!entrypoint) {
    throw new Error("Unable to resolve CLI entrypoint for watcher startup.");
  }
  return path.isAbsolute(entrypoint) ? entrypoint : path.resolve(process.cwd(), entrypoint);
}
