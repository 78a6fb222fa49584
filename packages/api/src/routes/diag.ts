/**
 * Diagnostics route: relay configuration as the process sees it, plus the
 * last upstream call and webhook request.
 *
 * The API key itself is never exposed, only whether one is set.
 */

import type { FastifyPluginAsync } from "fastify";
import type { DiagnosticsPayload } from "@skill-relay/shared";
import { BODY_KEY } from "../chatling/index.js";
import { DiagQuery } from "./diag.schemas.js";

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export const diagRoutes: FastifyPluginAsync = async (app) => {
  app.get<{ Querystring: DiagQuery }>(
    "/diag",
    { schema: { querystring: DiagQuery } },
    async (request, reply) => {
      const { chatling, diagnostics } = app;
      const { lastChatling, lastRequest } = diagnostics.snapshot();

      const payload: DiagnosticsPayload = {
        api_key_set: chatling.apiKeySet,
        chatling_url: chatling.url,
        model_id: chatling.modelId,
        body_key: BODY_KEY,
        sync_budget_s: chatling.timeoutMs / 1000,
        last_chatling: lastChatling,
        last_request: lastRequest,
      };

      if (firstValue(request.query.pretty)) {
        return reply
          .type("application/json; charset=utf-8")
          .send(JSON.stringify(payload, null, 2));
      }
      return reply.send(payload);
    },
  );
};
