import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_CHECK_INTERVAL_MINUTES,
  DEFAULT_NOTIFY_HOST,
  DEFAULT_REGION,
  DEFAULT_STOP_AFTER_HOURS,
  DEFAULT_TIME_ZONE
} from "./constants";
import { CliError } from "./errors";
import type { DevboxConfig } from "./types";
import { isRecord, normalizeInputPath } from "./utils";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".devbox", "config.json");

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configSchema = z.object({
  machineId: z
    .string({ required_error: "is required" })
    .trim()
    .regex(/^i-[0-9a-f]{8,17}$/, "must be an EC2 instance id such as i-0123456789abcdef0"),
  region: z.string().trim().min(1).default(DEFAULT_REGION),
  baseStopAfterHours: z.coerce.number().positive().default(DEFAULT_STOP_AFTER_HOURS),
  checkIntervalMinutes: z.coerce.number().int().positive().default(DEFAULT_CHECK_INTERVAL_MINUTES),
  notify: z
    .object({
      host: z.string().trim().url().default(DEFAULT_NOTIFY_HOST),
      topic: optionalText
    })
    .default({}),
  schedule: z
    .object({
      start: optionalText,
      stop: optionalText,
      timeZone: z.string().trim().min(1).default(DEFAULT_TIME_ZONE)
    })
    .default({})
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  filePath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): DevboxConfig {
  const env = options.env ?? process.env;
  const filePath = resolveConfigPath(options.filePath, env);
  const fromFile = readConfigFile(filePath);
  return parseConfig(mergeRaw(fromFile, fromEnv(env)), filePath);
}

export function parseConfig(raw: unknown, source = "configuration"): DevboxConfig {
  const result = configSchema.safeParse(raw);
  if (result.success) {
    const { notify, schedule, ...rest } = result.data;
    return {
      ...rest,
      notify: { host: notify.host.replace(/\/+$/, ""), topic: notify.topic },
      schedule: { start: schedule.start, stop: schedule.stop, timeZone: schedule.timeZone }
    };
  }

  const problems = result.error.issues.map((issue) => {
    const field = issue.path.join(".") || "(root)";
    return `  ${field}: ${issue.message}`;
  });
  throw new CliError({
    kind: "config",
    message: `Invalid devbox configuration (${source}).`,
    hint: "Set DEVBOX_INSTANCE_ID or write it to ~/.devbox/config.json, then run `devbox doctor`.",
    detail: problems.join("\n")
  });
}

function resolveConfigPath(explicit: string | undefined, env: NodeJS.ProcessEnv): string {
  const candidate = explicit ?? nonEmpty(env.DEVBOX_CONFIG);
  return candidate ? path.resolve(normalizeInputPath(candidate)) : DEFAULT_CONFIG_PATH;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliError({
      kind: "config",
      message: `Config file is not valid JSON: ${filePath}`,
      detail: error instanceof Error ? error.message : String(error)
    });
  }
  if (!isRecord(parsed)) {
    throw new CliError({
      kind: "config",
      message: `Config file must contain a JSON object: ${filePath}`
    });
  }
  return parsed;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    machineId: nonEmpty(env.DEVBOX_INSTANCE_ID),
    region: nonEmpty(env.DEVBOX_REGION) ?? nonEmpty(env.AWS_REGION),
    baseStopAfterHours: nonEmpty(env.DEVBOX_STOP_AFTER_HOURS),
    checkIntervalMinutes: nonEmpty(env.DEVBOX_CHECK_INTERVAL_MINUTES),
    notify: {
      host: nonEmpty(env.DEVBOX_NOTIFY_HOST),
      topic: nonEmpty(env.DEVBOX_NOTIFY_TOPIC)
    },
    schedule: {
      start: nonEmpty(env.DEVBOX_SCHEDULE_START),
      stop: nonEmpty(env.DEVBOX_SCHEDULE_STOP),
      timeZone: nonEmpty(env.DEVBOX_TIMEZONE)
    }
  };
}

// Environment wins over the file, key by key; unset env keys leave file values in place.
function mergeRaw(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = merged[key];
    merged[key] = isRecord(value) && isRecord(current) ? mergeRaw(current, value) : value;
  }
  for (const [key, value] of Object.entries(merged)) {
    if (isRecord(value) && Object.values(value).every((entry) => entry === undefined)) {
      delete merged[key];
    }
  }
  return merged;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
