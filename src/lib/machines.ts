import {
  CreateTagsCommand,
  DescribeInstancesCommand,
  EC2Client,
  StartInstancesCommand,
  StopInstancesCommand,
  type Instance
} from "@aws-sdk/client-ec2";
import { EC2_CONNECTION_TIMEOUT_MS, EC2_REQUEST_TIMEOUT_MS } from "./constants";
import type { MachineRecord, MachineState, TagSet } from "./types";

export interface MachineApi {
  describe(machineId: string): Promise<MachineRecord | null>;
  start(machineId: string): Promise<void>;
  stop(machineId: string): Promise<void>;
}

/**
 * Key-value view over the machine's tags. The tags are the only durable
 * state the controller owns; `merge` replaces the given keys and leaves the
 * rest untouched.
 */
export interface TagStore {
  get(machineId: string): Promise<TagSet | null>;
  merge(machineId: string, tags: TagSet): Promise<void>;
}

export type MachineOperation = "describe" | "start" | "stop" | "tag";

export class MachineApiError extends Error {
  operation: MachineOperation;
  machineId: string;
  code?: string;

  constructor(operation: MachineOperation, machineId: string, message: string, code?: string) {
    super(`Machine ${operation} failed for ${machineId}: ${message}`);
    this.name = "MachineApiError";
    this.operation = operation;
    this.machineId = machineId;
    this.code = code;
  }
}

const NOT_FOUND_CODES = new Set(["InvalidInstanceID.NotFound", "InvalidInstanceID.Malformed"]);

export function createEc2Client(region: string): EC2Client {
  return new EC2Client({
    region,
    // Retries belong to the triggers: the next periodic firing or the
    // redelivered state-change event.
    maxAttempts: 1,
    requestHandler: {
      connectionTimeout: EC2_CONNECTION_TIMEOUT_MS,
      requestTimeout: EC2_REQUEST_TIMEOUT_MS
    }
  });
}

export class Ec2MachineBackend implements MachineApi, TagStore {
  private readonly client: EC2Client;

  constructor(client: EC2Client) {
    this.client = client;
  }

  async describe(machineId: string): Promise<MachineRecord | null> {
    try {
      const result = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [machineId] }));
      const instance = result.Reservations?.[0]?.Instances?.[0];
      if (!instance) {
        return null;
      }
      return toMachineRecord(instance, machineId);
    } catch (error) {
      const code = getAwsErrorCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        return null;
      }
      throw toMachineApiError("describe", machineId, error);
    }
  }

  async start(machineId: string): Promise<void> {
    await this.run("start", machineId, () =>
      this.client.send(new StartInstancesCommand({ InstanceIds: [machineId] }))
    );
  }

  async stop(machineId: string): Promise<void> {
    await this.run("stop", machineId, () =>
      this.client.send(new StopInstancesCommand({ InstanceIds: [machineId] }))
    );
  }

  async get(machineId: string): Promise<TagSet | null> {
    const record = await this.describe(machineId);
    return record ? record.tags : null;
  }

  async merge(machineId: string, tags: TagSet): Promise<void> {
    const entries = Object.entries(tags);
    if (entries.length === 0) {
      return;
    }
    await this.run("tag", machineId, () =>
      this.client.send(
        new CreateTagsCommand({
          Resources: [machineId],
          Tags: entries.map(([Key, Value]) => ({ Key, Value }))
        })
      )
    );
  }

  private async run(operation: MachineOperation, machineId: string, call: () => Promise<unknown>): Promise<void> {
    try {
      await call();
    } catch (error) {
      throw toMachineApiError(operation, machineId, error);
    }
  }
}

export function mapEc2State(raw?: string): MachineState {
  switch (raw) {
    case "pending":
    case "running":
    case "stopping":
    case "stopped":
    case "shutting-down":
    case "terminated":
      return raw;
    default:
      return "unknown";
  }
}

export function toMachineRecord(instance: Instance, fallbackId: string): MachineRecord {
  const tags: TagSet = {};
  for (const tag of instance.Tags ?? []) {
    if (tag.Key && typeof tag.Value === "string") {
      tags[tag.Key] = tag.Value;
    }
  }

  return {
    id: instance.InstanceId ?? fallbackId,
    state: mapEc2State(instance.State?.Name),
    launchedAt: instance.LaunchTime,
    tags
  };
}

// SDK v3 service exceptions carry the EC2 error code in `name`.
export function getAwsErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && error.name && error.name !== "Error") {
    return error.name;
  }
  return undefined;
}

function toMachineApiError(operation: MachineOperation, machineId: string, error: unknown): MachineApiError {
  if (error instanceof MachineApiError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MachineApiError(operation, machineId, message, getAwsErrorCode(error));
}
