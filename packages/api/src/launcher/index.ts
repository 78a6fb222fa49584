/**
 * Launcher Module
 *
 * Picks one of three server variants, binds it and handles stop signals.
 * The relay app and static server are built through server-factory.ts;
 * nothing here reads request payloads.
 */

export { Launcher } from "./launcher.js";
export type { LauncherOptions, ServerFactory } from "./launcher.js";
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  MANAGED_TUNING,
  DIRECT_TUNING,
  STATIC_TUNING,
  parsePort,
  parseVariant,
  resolveLaunchPlan,
} from "./launch-plan.js";
export { createServer, limitsFor, serverOptionsFor } from "./server-factory.js";
export { buildStaticServer } from "./static-server.js";
export type { StaticServerOptions } from "./static-server.js";
export { closeWithin, installShutdownHandlers } from "./shutdown.js";
export type { CloseOutcome, ShutdownOptions } from "./shutdown.js";
