import { createRuntime } from "./lib/command-context";
import { loadConfig } from "./lib/config";
import { classifyEvent, handleLifecycleEvent, type ControllerDeps } from "./lib/controller";
import { createConsoleLogger } from "./lib/log";
import type { ControllerResult } from "./lib/types";

export interface HandlerResponse {
  statusCode: number;
  body: string;
}

/**
 * Entry point for a serverless deployment fed by an EC2 state-change rule
 * and a periodic rule. Machine API failures reject so the invoking event
 * system records a failed invocation.
 */
export async function handler(event: unknown): Promise<HandlerResponse> {
  const config = loadConfig();
  return await handleEvent(event, createRuntime(config, { logger: createConsoleLogger("handler") }));
}

export async function handleEvent(event: unknown, deps: ControllerDeps): Promise<HandlerResponse> {
  const result = await handleLifecycleEvent(classifyEvent(event), deps);
  return toResponse(result);
}

export function toResponse(result: ControllerResult): HandlerResponse {
  return {
    statusCode: result.outcome === "not_found" ? 404 : 200,
    body: result.message
  };
}
