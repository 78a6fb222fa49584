/**
 * How the process serves HTTP. Chosen by the command that starts the
 * process, never switched while it runs.
 *
 * - `managed`: relay app behind concurrency, deadline and shutdown limits
 * - `direct`: relay app with server defaults
 * - `static`: working-directory file server, one request at a time
 */
export type LaunchVariant = "managed" | "direct" | "static";

/** Launcher lifecycle. The only transition is not_started -> running. */
export type LauncherState = "not_started" | "running";

/** Serving limits applied to a launched server */
export interface ServerTuning {
  /** Requests allowed to run handlers at once (undefined = unlimited) */
  maxConcurrentRequests?: number;
  /** A request holding a slot longer than this gets a 503 */
  requestTimeoutMs?: number;
  /** Time in-flight requests get after a stop signal (undefined = exit now) */
  gracefulShutdownMs?: number;
  /** Idle keep-alive connection lifetime */
  keepAliveMs?: number;
}

/** Everything needed to bind one server */
export interface LaunchPlan {
  variant: LaunchVariant;
  host: string;
  port: number;
  tuning: ServerTuning;
}
