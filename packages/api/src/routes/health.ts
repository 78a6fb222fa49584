import type { FastifyPluginAsync } from "fastify";

/** Liveness only: no upstream check, the relay is up if it answers */
export const healthRoutes: FastifyPluginAsync = async (app) => {
  for (const url of ["/", "/healthz"]) {
    app.get(url, async (_request, reply) => {
      return reply.type("text/plain; charset=utf-8").send("ok");
    });
  }
};
