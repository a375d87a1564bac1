export type MachineState =
  | "pending"
  | "running"
  | "stopping"
  | "stopped"
  | "shutting-down"
  | "terminated"
  | "unknown";

export type TagSet = Record<string, string>;

export interface MachineRecord {
  id: string;
  state: MachineState;
  launchedAt?: Date;
  tags: TagSet;
}

export type LifecycleEvent =
  | { kind: "state-changed"; machineId?: string; state: string }
  | { kind: "periodic-check" };

export type ControllerOutcome = "no_action" | "tagged" | "stopped" | "not_found";

export interface ControllerResult {
  ok: boolean;
  outcome: ControllerOutcome;
  message: string;
  machineId?: string;
  elapsedHours?: number;
  thresholdHours?: number;
}

export interface ScheduleConfig {
  start?: string;
  stop?: string;
  timeZone: string;
}

export interface NotifyConfig {
  host: string;
  topic?: string;
}

export interface DevboxConfig {
  machineId: string;
  region: string;
  baseStopAfterHours: number;
  checkIntervalMinutes: number;
  notify: NotifyConfig;
  schedule: ScheduleConfig;
}
