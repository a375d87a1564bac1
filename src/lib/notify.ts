import { NOTIFY_TIMEOUT_MS } from "./constants";
import type { Logger } from "./log";
import { silentLogger } from "./log";
import type { NotifyConfig } from "./types";

export type NotifyPriority = "min" | "low" | "default" | "high" | "urgent";

export interface NotifyMessage {
  title: string;
  body: string;
  priority: NotifyPriority;
  tags?: string[];
}

export interface NotifyResult {
  status: "sent" | "skipped" | "failed";
  detail?: string;
}

export interface Notifier {
  send(message: NotifyMessage): Promise<NotifyResult>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface NotifierOptions extends NotifyConfig {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Push notifications over an ntfy-compatible HTTP endpoint. Delivery is
 * best-effort: `send` resolves with a result for every outcome and never
 * rejects, so a broken endpoint cannot fail the stop decision that
 * triggered it.
 */
export function createNotifier(options: NotifierOptions): Notifier {
  const timeoutMs = options.timeoutMs ?? NOTIFY_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const logger = options.logger ?? silentLogger;

  return {
    async send(message) {
      if (!options.topic) {
        logger.info(`Notification skipped (no topic configured): ${message.title}`);
        return { status: "skipped" };
      }

      const url = `${options.host.replace(/\/+$/, "")}/${encodeURIComponent(options.topic)}`;
      const headers: Record<string, string> = {
        Title: message.title,
        Priority: message.priority
      };
      if (message.tags && message.tags.length > 0) {
        headers.Tags = message.tags.join(",");
      }

      try {
        const response = await fetchImpl(url, {
          method: "POST",
          headers,
          body: message.body,
          signal: AbortSignal.timeout(timeoutMs)
        });
        if (!response.ok) {
          const detail = `HTTP ${response.status} from ${url}`;
          logger.warn(`Notification failed: ${detail}`);
          return { status: "failed", detail };
        }
        logger.info(`Notification sent to ${url}: ${message.title}`);
        return { status: "sent" };
      } catch (error) {
        const detail = describeFetchError(error, timeoutMs);
        logger.warn(`Notification failed: ${detail}`);
        return { status: "failed", detail };
      }
    }
  };
}

// Timeouts surface as a DOMException, which is not an Error subclass everywhere.
function describeFetchError(error: unknown, timeoutMs: number): string {
  const name = typeof error === "object" && error !== null && "name" in error ? error.name : undefined;
  if (name === "TimeoutError" || name === "AbortError") {
    return `timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : String(error);
}
