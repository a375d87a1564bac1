import { fixedClock } from "../src/lib/clock";
import type { ControllerDeps } from "../src/lib/controller";
import type { Logger } from "../src/lib/log";
import { MachineApiError, type MachineApi, type TagStore } from "../src/lib/machines";
import type { Notifier, NotifyMessage, NotifyResult } from "../src/lib/notify";
import type { DevboxConfig, MachineRecord, TagSet } from "../src/lib/types";

export const MACHINE_ID = "i-0123456789abcdef0";
export const NOW = new Date("2026-10-18T12:00:00.000Z");

export type FakeOperation = "describe" | "start" | "stop" | "merge";

export interface FakeCall {
  op: FakeOperation;
  machineId: string;
  tags?: TagSet;
}

export class FakeMachineBackend implements MachineApi, TagStore {
  readonly records = new Map<string, MachineRecord>();
  readonly calls: FakeCall[] = [];
  readonly failures: Partial<Record<FakeOperation, Error>> = {};

  constructor(records: MachineRecord[] = []) {
    for (const record of records) {
      this.records.set(record.id, { ...record, tags: { ...record.tags } });
    }
  }

  async describe(machineId: string): Promise<MachineRecord | null> {
    this.record("describe", machineId);
    const record = this.records.get(machineId);
    return record ? { ...record, tags: { ...record.tags } } : null;
  }

  async start(machineId: string): Promise<void> {
    this.record("start", machineId);
    this.require(machineId).state = "running";
  }

  async stop(machineId: string): Promise<void> {
    this.record("stop", machineId);
    this.require(machineId).state = "stopped";
  }

  async get(machineId: string): Promise<TagSet | null> {
    const record = this.records.get(machineId);
    return record ? { ...record.tags } : null;
  }

  async merge(machineId: string, tags: TagSet): Promise<void> {
    this.record("merge", machineId, tags);
    const record = this.require(machineId);
    record.tags = { ...record.tags, ...tags };
  }

  mutations(): FakeCall[] {
    return this.calls.filter((call) => call.op !== "describe");
  }

  tagsOf(machineId: string = MACHINE_ID): TagSet {
    return { ...this.require(machineId).tags };
  }

  private record(op: FakeOperation, machineId: string, tags?: TagSet): void {
    this.calls.push(tags ? { op, machineId, tags: { ...tags } } : { op, machineId });
    const failure = this.failures[op];
    if (failure) {
      throw failure;
    }
  }

  private require(machineId: string): MachineRecord {
    const record = this.records.get(machineId);
    if (!record) {
      throw new MachineApiError("describe", machineId, "does not exist", "InvalidInstanceID.NotFound");
    }
    return record;
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: NotifyMessage[] = [];
  result: NotifyResult = { status: "sent" };

  async send(message: NotifyMessage): Promise<NotifyResult> {
    this.messages.push(message);
    return this.result;
  }
}

export interface MemoryLogger extends Logger {
  lines: string[];
}

export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`)
  };
}

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * 3_600_000);
}

export function runningMachine(overrides: Partial<MachineRecord> = {}): MachineRecord {
  return {
    id: MACHINE_ID,
    state: "running",
    launchedAt: hoursAgo(30),
    tags: {},
    ...overrides
  };
}

export function testConfig(overrides: Partial<DevboxConfig> = {}): DevboxConfig {
  return {
    machineId: MACHINE_ID,
    region: "us-east-1",
    baseStopAfterHours: 4,
    checkIntervalMinutes: 60,
    notify: { host: "https://ntfy.example.test", topic: "devbox-test" },
    schedule: { timeZone: "UTC" },
    ...overrides
  };
}

export interface TestDeps extends ControllerDeps {
  config: DevboxConfig;
  backend: FakeMachineBackend;
  notifier: RecordingNotifier;
  logger: MemoryLogger;
}

export function createTestDeps(records: MachineRecord[], config: Partial<DevboxConfig> = {}): TestDeps {
  const backend = new FakeMachineBackend(records);
  return {
    config: testConfig(config),
    backend,
    machines: backend,
    tags: backend,
    notifier: new RecordingNotifier(),
    clock: fixedClock(NOW),
    logger: createMemoryLogger()
  };
}
