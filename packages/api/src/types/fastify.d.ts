import "fastify";
import type { ChatlingClient } from "../chatling/chatling-client.js";
import type { DiagnosticsStore } from "../diagnostics/diagnostics-store.js";

declare module "fastify" {
  interface FastifyInstance {
    chatling: ChatlingClient;
    diagnostics: DiagnosticsStore;
  }
}
