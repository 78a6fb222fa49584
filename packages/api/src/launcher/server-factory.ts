import type { FastifyInstance, FastifyServerOptions } from "fastify";
import type { LaunchPlan, ServerTuning } from "@skill-relay/shared";

import { buildApp } from "../app.js";
import type { RelayConfig } from "../config.js";
import type { RequestLimitsOptions } from "../hooks/request-limits.js";
import { buildStaticServer } from "./static-server.js";

export function limitsFor(tuning: ServerTuning): RequestLimitsOptions {
  return {
    maxConcurrent: tuning.maxConcurrentRequests,
    timeoutMs: tuning.requestTimeoutMs,
  };
}

/** Fastify server options derived from tuning (keep-alive only for now) */
export function serverOptionsFor(tuning: ServerTuning): FastifyServerOptions {
  return tuning.keepAliveMs !== undefined
    ? { keepAliveTimeout: tuning.keepAliveMs }
    : {};
}

/** Build the server a plan asks for. Nothing is bound yet. */
export async function createServer(
  plan: LaunchPlan,
  config: RelayConfig,
): Promise<FastifyInstance> {
  const limits = limitsFor(plan.tuning);
  const serverOpts = serverOptionsFor(plan.tuning);

  switch (plan.variant) {
    case "managed":
    case "direct":
      return buildApp({ ...serverOpts, config, limits });
    case "static":
      return buildStaticServer({ ...serverOpts, logging: config, limits });
  }
}
