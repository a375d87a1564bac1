import type { Clock } from "./clock";
import { AUTO_STOP_DEFER_HOURS_TAG, CLI_NAME, EC2_EVENT_SOURCES, LAST_STARTED_AT_TAG } from "./constants";
import { CliError } from "./errors";
import type { Logger } from "./log";
import type { MachineApi, TagStore } from "./machines";
import type { Notifier } from "./notify";
import type { ControllerResult, DevboxConfig, LifecycleEvent, MachineRecord } from "./types";
import { formatHours, hoursBetween, isRecord, parseMaybeNumber, parseTimestamp, stringField } from "./utils";

export interface ControllerDeps {
  config: Pick<DevboxConfig, "machineId" | "baseStopAfterHours">;
  machines: MachineApi;
  tags: TagStore;
  notifier: Notifier;
  clock: Clock;
  logger: Logger;
}

/**
 * Turns a raw trigger payload into a lifecycle event. Only payloads carrying
 * the EC2 source marker are state changes; everything else, including an
 * empty scheduled-rule payload, is a periodic check.
 */
export function classifyEvent(raw: unknown): LifecycleEvent {
  if (!isRecord(raw) || !isEc2Source(raw.source)) {
    return { kind: "periodic-check" };
  }

  const detail = isRecord(raw.detail) ? raw.detail : {};
  return {
    kind: "state-changed",
    machineId: stringField(detail["instance-id"]) || undefined,
    state: stringField(detail.state) ?? ""
  };
}

export async function handleLifecycleEvent(event: LifecycleEvent, deps: ControllerDeps): Promise<ControllerResult> {
  switch (event.kind) {
    case "state-changed":
      return await handleStateChange(event, deps);
    case "periodic-check":
      return await runFailSafeCheck(deps);
    default:
      return assertNever(event);
  }
}

export async function handleStateChange(
  event: Extract<LifecycleEvent, { kind: "state-changed" }>,
  deps: ControllerDeps
): Promise<ControllerResult> {
  const machineId = event.machineId ?? deps.config.machineId;
  if (event.state !== "running") {
    deps.logger.info(`${machineId} is now ${event.state || "(no state)"}; nothing to record.`);
    return {
      ok: true,
      outcome: "no_action",
      machineId,
      message: `State '${event.state}' needs no action.`
    };
  }

  const startedAt = deps.clock().toISOString();
  await deps.tags.merge(machineId, {
    [LAST_STARTED_AT_TAG]: startedAt,
    [AUTO_STOP_DEFER_HOURS_TAG]: "0"
  });
  deps.logger.info(`${machineId} entered running; ${LAST_STARTED_AT_TAG}=${startedAt}, deferral reset.`);
  return {
    ok: true,
    outcome: "tagged",
    machineId,
    message: `Recorded start at ${startedAt}.`
  };
}

/**
 * Backstop for forgotten or missed scheduled stops: stops the machine once it
 * has been running for the base threshold plus any operator deferral.
 */
export async function runFailSafeCheck(deps: ControllerDeps): Promise<ControllerResult> {
  const { machineId, baseStopAfterHours } = deps.config;
  const record = await deps.machines.describe(machineId);
  if (!record) {
    deps.logger.error(`Machine ${machineId} not found; check the configured instance id.`);
    return {
      ok: false,
      outcome: "not_found",
      machineId,
      message: `Machine ${machineId} not found.`
    };
  }

  if (record.state !== "running") {
    deps.logger.info(`${machineId} is ${record.state}; no action needed.`);
    return {
      ok: true,
      outcome: "no_action",
      machineId,
      message: `Machine is ${record.state}; no action needed.`
    };
  }

  const { thresholdHours, elapsedHours } = evaluateRuntime(record, baseStopAfterHours, deps.clock());

  if (elapsedHours < thresholdHours) {
    deps.logger.info(
      `${machineId} running ${formatHours(elapsedHours)} of ${formatHours(thresholdHours)}; no action needed.`
    );
    return {
      ok: true,
      outcome: "no_action",
      machineId,
      elapsedHours,
      thresholdHours,
      message: `Running ${formatHours(elapsedHours)} of ${formatHours(thresholdHours)}; no action needed.`
    };
  }

  deps.logger.warn(
    `${machineId} running ${formatHours(elapsedHours)}, threshold ${formatHours(thresholdHours)}; stopping.`
  );
  await deps.machines.stop(machineId);
  await notifyStop(deps, machineId, elapsedHours, thresholdHours);
  await deps.tags.merge(machineId, { [AUTO_STOP_DEFER_HOURS_TAG]: "0" });

  return {
    ok: true,
    outcome: "stopped",
    machineId,
    elapsedHours,
    thresholdHours,
    message: `Fail-safe: instance stopped after ${formatHours(elapsedHours)}.`
  };
}

export interface RuntimeEvaluation {
  referenceStart: Date;
  elapsedHours: number;
  deferHours: number;
  thresholdHours: number;
  remainingHours: number;
}

export function evaluateRuntime(record: MachineRecord, baseStopAfterHours: number, now: Date): RuntimeEvaluation {
  const referenceStart = resolveReferenceStart(record);
  const elapsedHours = hoursBetween(referenceStart, now);
  const deferHours = parseDeferHours(record.tags[AUTO_STOP_DEFER_HOURS_TAG]);
  const thresholdHours = baseStopAfterHours + deferHours;
  return {
    referenceStart,
    elapsedHours,
    deferHours,
    thresholdHours,
    remainingHours: Math.max(0, thresholdHours - elapsedHours)
  };
}

// Unparsable values count as no deferral; parsable ones, negatives included,
// apply as written.
export function parseDeferHours(raw?: string): number {
  return parseMaybeNumber(raw) ?? 0;
}

/**
 * `LastStartedAt` when it holds a valid timestamp, else the provider's launch
 * time. Machines started before tagging existed have no `LastStartedAt`.
 */
export function resolveReferenceStart(record: MachineRecord): Date {
  const stamped = parseTimestamp(record.tags[LAST_STARTED_AT_TAG]);
  if (stamped) {
    return stamped;
  }
  if (record.launchedAt && !Number.isNaN(record.launchedAt.getTime())) {
    return record.launchedAt;
  }
  throw new CliError({
    kind: "runtime",
    message: `Machine ${record.id} has neither a valid ${LAST_STARTED_AT_TAG} tag nor a launch time.`
  });
}

async function notifyStop(
  deps: ControllerDeps,
  machineId: string,
  elapsedHours: number,
  thresholdHours: number
): Promise<void> {
  try {
    await deps.notifier.send({
      title: "Dev machine stopped",
      body: [
        `${machineId} ran for ${formatHours(elapsedHours)} (limit ${formatHours(thresholdHours)}) and was stopped by the fail-safe.`,
        `Restart with: ${CLI_NAME} start`
      ].join("\n"),
      priority: "urgent",
      tags: ["warning", "auto-stop"]
    });
  } catch (error) {
    deps.logger.warn(`Stop notification failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function isEc2Source(value: unknown): boolean {
  return EC2_EVENT_SOURCES.some((source) => source === value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled lifecycle event: ${JSON.stringify(value)}`);
}
