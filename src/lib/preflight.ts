import { createRuntime } from "./command-context";
import { loadConfig } from "./config";
import { MIN_SUPPORTED_NODE_MAJOR } from "./constants";
import { toCliError } from "./errors";
import { silentLogger } from "./log";
import { validateSchedule } from "./schedule";
import type { DevboxConfig } from "./types";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  warning?: boolean;
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export interface PreflightOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
  describeMachine?: (config: DevboxConfig) => Promise<string | null>;
}

export async function runPreflight(options: PreflightOptions = {}): Promise<PreflightReport> {
  const checks: PreflightCheck[] = [];

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  const nodeOk = Number.isFinite(nodeMajor) && nodeMajor >= MIN_SUPPORTED_NODE_MAJOR;
  checks.push({
    key: "node",
    ok: nodeOk,
    message: `Node.js v${nodeVersion}`,
    fix: nodeOk ? undefined : `Install Node.js ${MIN_SUPPORTED_NODE_MAJOR} or newer.`
  });

  let config: DevboxConfig;
  try {
    config = loadConfig({ env: options.env, filePath: options.configPath });
  } catch (error) {
    const cliError = toCliError(error);
    checks.push({
      key: "config",
      ok: false,
      message: [cliError.message, cliError.detail].filter(Boolean).join("\n"),
      fix: cliError.hint
    });
    return finish(checks);
  }

  checks.push({
    key: "config",
    ok: true,
    message: `Managing ${config.machineId} in ${config.region}; fail-safe after ${config.baseStopAfterHours}h, checked every ${config.checkIntervalMinutes}m`
  });

  const scheduleProblems = validateSchedule(config.schedule);
  checks.push({
    key: "schedule",
    ok: scheduleProblems.length === 0,
    message: scheduleProblems.length > 0
      ? scheduleProblems.join("\n")
      : describeScheduleConfig(config),
    fix: scheduleProblems.length > 0 ? "Fix DEVBOX_SCHEDULE_START / DEVBOX_SCHEDULE_STOP / DEVBOX_TIMEZONE." : undefined
  });

  checks.push({
    key: "notify",
    ok: true,
    warning: !config.notify.topic,
    message: config.notify.topic
      ? `Notifications go to ${config.notify.host}/${config.notify.topic}`
      : "No notification topic configured; fail-safe stops will not be announced.",
    fix: config.notify.topic ? undefined : "Set DEVBOX_NOTIFY_TOPIC to receive stop notifications."
  });

  const describeMachine = options.describeMachine ?? describeWithEc2;
  try {
    const state = await describeMachine(config);
    checks.push({
      key: "machine",
      ok: state !== null,
      message: state !== null ? `${config.machineId} is ${state}` : `${config.machineId} was not found in ${config.region}`,
      fix: state !== null ? undefined : "Check DEVBOX_INSTANCE_ID and DEVBOX_REGION."
    });
  } catch (error) {
    const cliError = toCliError(error);
    checks.push({
      key: "machine",
      ok: false,
      message: [cliError.message, cliError.detail].filter(Boolean).join("\n"),
      fix: cliError.hint ?? "Check your AWS credentials and network access."
    });
  }

  return finish(checks);
}

function describeScheduleConfig(config: DevboxConfig): string {
  const { start, stop, timeZone } = config.schedule;
  if (!start && !stop) {
    return "No fixed start/stop schedule configured";
  }
  return `Schedule (${timeZone}): start ${start ?? "-"}, stop ${stop ?? "-"}`;
}

async function describeWithEc2(config: DevboxConfig): Promise<string | null> {
  const runtime = createRuntime(config, { logger: silentLogger });
  const record = await runtime.machines.describe(config.machineId);
  return record ? record.state : null;
}

function finish(checks: PreflightCheck[]): PreflightReport {
  return { checks, ok: checks.every((check) => check.ok) };
}
