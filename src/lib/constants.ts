export const CLI_NAME = "caretaker";
export const CONFIG_DIR_NAME = ".caretaker";
export const CONFIG_FILE_NAME = "config.json";

export const CONFIG_PATH_ENV = "CARETAKER_CONFIG";
export const DISCORD_TOKEN_ENV = "CARETAKER_DISCORD_TOKEN";
export const AWS_ACCESS_KEY_ENV = "CARETAKER_AWS_ACCESS_KEY_ID";
export const AWS_SECRET_KEY_ENV = "CARETAKER_AWS_SECRET_ACCESS_KEY";

export const DEFAULT_REGION = "us-east-1";
export const RUN_SHELL_DOCUMENT = "AWS-RunShellScript";

export const SEND_ATTEMPT_MAX = 20;
export const SEND_DELAY_MS = 5_000;
export const POLL_ATTEMPT_MAX = 40;
export const POLL_DELAY_MS = 1_000;
export const COMMAND_ATTEMPT_MAX = 40;
export const COMMAND_DELAY_MS = 15_000;

// Matches the provider's own instance waiters: 40 checks, 15s apart.
export const STATE_WAIT_INTERVAL_MS = 15_000;
export const STATE_WAIT_TIMEOUT_MS = 600_000;

export const IDLE_CHECK_INTERVAL_MS = 5 * 60_000;
export const IDLE_SHUTDOWN_AFTER_MS = 30 * 60_000;

export const MIN_NODE_MAJOR = 20;
