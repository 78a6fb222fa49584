/**
 * Command-line entry: `skill-relay [managed|direct|static]`.
 *
 * Environment: PORT, HOST, NODE_ENV, LOG_LEVEL and the CHATLING_* settings
 * (see config.ts). Any startup failure is fatal.
 */

import { loadConfig, loadLoggingConfig, type Env } from "./config.js";
import { Launcher, createServer, parseVariant, resolveLaunchPlan } from "./launcher/index.js";
import { createLogger } from "./logging.js";

export interface RunOptions {
  /** Install stop-signal handlers once running (default: true) */
  handleSignals?: boolean;
}

/**
 * Resolve the plan from `argv` and `env` and start serving.
 * Resolves with the exit status to use if startup failed (1), or 0 once
 * the server is listening; the process then stays up until signalled.
 */
export async function run(
  argv: string[],
  env: Env = process.env,
  options: RunOptions = {},
): Promise<number> {
  try {
    const variant = parseVariant(argv[0]);
    const plan = resolveLaunchPlan(variant, env);
    const config = loadConfig(env);

    const launcher = new Launcher(plan, {
      factory: (p) => createServer(p, config),
      handleSignals: options.handleSignals,
    });
    await launcher.start();
    return 0;
  } catch (err) {
    // The server's logger may not exist yet
    const logger = createLogger(loadLoggingConfig(env));
    logger.fatal({ err }, "startup failed");
    return 1;
  }
}
