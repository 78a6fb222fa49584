/**
 * Process launcher: builds the server a plan describes and binds it.
 *
 * Two states, one transition: not_started -> running. There is no stopped
 * state; stopping is a signal to the process, see shutdown.ts.
 */

import type { FastifyInstance } from "fastify";
import type { LaunchPlan, LauncherState } from "@skill-relay/shared";

import { LauncherStateError } from "../errors.js";
import { installShutdownHandlers, type ShutdownOptions } from "./shutdown.js";

export type ServerFactory = (plan: LaunchPlan) => Promise<FastifyInstance>;

export interface LauncherOptions {
  factory: ServerFactory;
  /** Install SIGTERM/SIGINT handlers once running (default: true) */
  handleSignals?: boolean;
  /** Passed to the shutdown handlers; graceMs comes from the plan */
  shutdown?: Omit<ShutdownOptions, "graceMs">;
}

export class Launcher {
  readonly plan: LaunchPlan;
  private options: LauncherOptions;
  private currentState: LauncherState = "not_started";
  private starting = false;
  private instance: FastifyInstance | null = null;

  constructor(plan: LaunchPlan, options: LauncherOptions) {
    this.plan = plan;
    this.options = options;
  }

  get state(): LauncherState {
    return this.currentState;
  }

  /** The bound server, once running */
  get server(): FastifyInstance | null {
    return this.instance;
  }

  /** Build and bind the server. Resolves with the listening address. */
  async start(): Promise<string> {
    if (this.starting || this.currentState !== "not_started") {
      throw new LauncherStateError("Launcher has already been started.");
    }
    this.starting = true;

    const { variant, host, port, tuning } = this.plan;
    const server = await this.options.factory(this.plan);
    let address: string;
    try {
      address = await server.listen({ host, port });
    } catch (err) {
      await server.close();
      throw err;
    }

    this.instance = server;
    this.currentState = "running";
    server.log.info({ variant, tuning }, `running on ${host}:${port}`);

    if (this.options.handleSignals ?? true) {
      installShutdownHandlers(server, {
        ...this.options.shutdown,
        graceMs: tuning.gracefulShutdownMs,
      });
    }

    return address;
  }
}
