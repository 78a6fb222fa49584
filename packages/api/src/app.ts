import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import { randomUUID } from "node:crypto";

import { ChatlingClient } from "./chatling/index.js";
import { DiagnosticsStore } from "./diagnostics/diagnostics-store.js";
import { applyRequestLimits, type RequestLimitsOptions } from "./hooks/request-limits.js";
import { loadConfig, type RelayConfig } from "./config.js";
import { loggerOptions } from "./logging.js";
import { diagRoutes } from "./routes/diag.js";
import { healthRoutes } from "./routes/health.js";
import { webhookRoutes } from "./routes/webhook.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the environment-derived config */
  config?: RelayConfig;
  /** Override the upstream client (for testing) */
  chatling?: ChatlingClient;
  /** Override the diagnostics store (for testing) */
  diagnostics?: DiagnosticsStore;
  /** Concurrency and deadline limits; none by default */
  limits?: RequestLimitsOptions;
}

/**
 * Shared Fastify options: pino logging unless the caller brings its own,
 * request IDs taken from `x-request-id` when the caller sends one.
 */
export function baseServerOptions(
  config: Pick<RelayConfig, "isDev" | "logLevel">,
  overrides: FastifyServerOptions,
): FastifyServerOptions {
  const ownLogger =
    overrides.logger !== undefined || overrides.loggerInstance !== undefined;

  return {
    ...(ownLogger ? {} : { logger: loggerOptions(config) }),
    genReqId: (req) => {
      const header = req.headers["x-request-id"];
      return typeof header === "string" && header !== "" ? header : randomUUID();
    },
    ...overrides,
  };
}

/**
 * Build and configure the relay application.
 * Exported separately from the launcher so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions): Promise<FastifyInstance> {
  const {
    config: customConfig,
    chatling: customChatling,
    diagnostics: customDiagnostics,
    limits,
    ...fastifyOpts
  } = opts ?? {};

  const config = customConfig ?? loadConfig();
  const app = Fastify(baseServerOptions(config, fastifyOpts));

  const diagnostics = customDiagnostics ?? new DiagnosticsStore();
  const chatling =
    customChatling ??
    new ChatlingClient(config.chatling, { diagnostics, logger: app.log });
  app.decorate("diagnostics", diagnostics);
  app.decorate("chatling", chatling);

  if (limits) {
    applyRequestLimits(app, limits);
  }

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      const details = error.validation.map((v) => {
        const missing = v.params.missingProperty;
        return {
          field: v.instancePath || (typeof missing === "string" ? missing : "") || "query",
          message: v.message ?? "Invalid value",
        };
      });
      return reply.status(400).send({ error: "Validation failed", details });
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, "unhandled error");
    return reply.status(error.statusCode ?? 500).send({
      error: config.isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes);
  await app.register(diagRoutes);
  await app.register(webhookRoutes);

  return app;
}
