/**
 * Error classes for startup and launcher failures.
 *
 * Each carries a stable machine-readable `code`. None of these are
 * recoverable: the CLI logs them and exits with status 1.
 */

export type RelayErrorCode =
  | "CONFIG_INVALID"
  | "LAUNCH_CONFIG_INVALID"
  | "LAUNCHER_ALREADY_STARTED";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string) {
    super(message);
    this.name = "RelayError";
    this.code = code;
  }
}

/** An environment variable holds a value the relay cannot use */
export class ConfigError extends RelayError {
  /** Offending variable name */
  readonly variable: string;

  constructor(variable: string, message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** The launch plan cannot be resolved (bad variant, missing or invalid PORT) */
export class LaunchConfigError extends RelayError {
  constructor(message: string) {
    super("LAUNCH_CONFIG_INVALID", message);
    this.name = "LaunchConfigError";
  }
}

/** `Launcher.start()` was called on a launcher that already left not_started */
export class LauncherStateError extends RelayError {
  constructor(message: string) {
    super("LAUNCHER_ALREADY_STARTED", message);
    this.name = "LauncherStateError";
  }
}
