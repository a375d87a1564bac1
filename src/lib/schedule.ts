import { Cron } from "croner";
import type { Logger } from "./log";
import type { MachineApi } from "./machines";
import type { ScheduleConfig } from "./types";

export type ScheduledAction = "start" | "stop";

export interface ScheduleEntry {
  action: ScheduledAction;
  expression: string;
  nextRun: Date | null;
}

export interface Scheduler {
  entries(): ScheduleEntry[];
  stop(): void;
}

export interface SchedulerOptions {
  machineId: string;
  schedule: ScheduleConfig;
  machines: MachineApi;
  logger: Logger;
  // Lets the watcher funnel firings through its serial queue.
  enqueue?: (task: () => Promise<void>) => Promise<void>;
}

export function validateSchedule(schedule: ScheduleConfig): string[] {
  const problems: string[] = [];
  if (!isValidTimeZone(schedule.timeZone)) {
    problems.push(`Unknown time zone '${schedule.timeZone}'.`);
  }

  for (const [action, expression] of scheduledExpressions(schedule)) {
    try {
      new Cron(expression);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`Invalid ${action} expression '${expression}': ${reason}`);
    }
  }
  return problems;
}

export function describeSchedule(schedule: ScheduleConfig, from: Date = new Date()): ScheduleEntry[] {
  return scheduledExpressions(schedule).map(([action, expression]) => ({
    action,
    expression,
    nextRun: new Cron(expression, { timezone: schedule.timeZone }).nextRun(from)
  }));
}

/**
 * Fixed-time start/stop, independent of the fail-safe controller: firings
 * go straight to the machine API and never touch the tags.
 */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const problems = validateSchedule(options.schedule);
  if (problems.length > 0) {
    throw new Error(`Schedule is invalid:\n${problems.join("\n")}`);
  }

  const enqueue = options.enqueue ?? ((task: () => Promise<void>) => task());
  const jobs = scheduledExpressions(options.schedule).map(([action, expression]) => {
    const job = new Cron(
      expression,
      { name: `devbox-${action}`, timezone: options.schedule.timeZone, protect: true },
      () => enqueue(() => runScheduledAction(action, options))
    );
    return { action, expression, job };
  });

  for (const { action, expression, job } of jobs) {
    const next = job.nextRun();
    options.logger.info(
      `Scheduled ${action} '${expression}' (${options.schedule.timeZone}); next ${next ? next.toISOString() : "never"}.`
    );
  }

  return {
    entries: () => jobs.map(({ action, expression, job }) => ({ action, expression, nextRun: job.nextRun() })),
    stop: () => {
      for (const { job } of jobs) {
        job.stop();
      }
    }
  };
}

export async function runScheduledAction(
  action: ScheduledAction,
  options: Pick<SchedulerOptions, "machineId" | "machines" | "logger">
): Promise<void> {
  try {
    if (action === "start") {
      await options.machines.start(options.machineId);
    } else {
      await options.machines.stop(options.machineId);
    }
    options.logger.info(`Scheduled ${action} issued for ${options.machineId}.`);
  } catch (error) {
    // The next firing is the retry.
    const reason = error instanceof Error ? error.message : String(error);
    options.logger.error(`Scheduled ${action} failed for ${options.machineId}: ${reason}`);
  }
}

function scheduledExpressions(schedule: ScheduleConfig): Array<[ScheduledAction, string]> {
  const pairs: Array<[ScheduledAction, string]> = [];
  if (schedule.start) {
    pairs.push(["start", schedule.start]);
  }
  if (schedule.stop) {
    pairs.push(["stop", schedule.stop]);
  }
  return pairs;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
