export const CLI_NAME = "devbox";

export const LAST_STARTED_AT_TAG = "LastStartedAt";
export const AUTO_STOP_DEFER_HOURS_TAG = "AutoStopDeferHours";

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_STOP_AFTER_HOURS = 4;
export const DEFAULT_CHECK_INTERVAL_MINUTES = 60;
export const DEFAULT_NOTIFY_HOST = "https://ntfy.sh";
export const DEFAULT_TIME_ZONE = "UTC";

export const NOTIFY_TIMEOUT_MS = 10_000;
export const EC2_CONNECTION_TIMEOUT_MS = 5_000;
export const EC2_REQUEST_TIMEOUT_MS = 10_000;

// State-change detection cadence for the self-hosted watcher.
export const WATCH_POLL_SECONDS = 30;

export const EC2_EVENT_SOURCES = ["ec2", "aws.ec2"] as const;

export const MIN_SUPPORTED_NODE_MAJOR = 20;
