import type { FastifyInstance, FastifyRequest } from "fastify";
import { ConcurrencyGate } from "./concurrency-gate.js";

export interface RequestLimitsOptions {
  /** Requests allowed past onRequest at once; others queue in arrival order */
  maxConcurrent?: number;
  /** Answer 503 if a request holding a slot has not replied by then */
  timeoutMs?: number;
}

/**
 * Add concurrency and deadline hooks to the root instance so they cover
 * every route, including ones registered by plugins afterwards.
 *
 * A timed-out handler keeps running; its slot is freed and whatever it
 * replies later is dropped by Fastify. A request whose client disconnected
 * while queued gives its slot back as soon as it gets one and is hijacked,
 * so no handler runs for it.
 */
export function applyRequestLimits(
  app: FastifyInstance,
  options: RequestLimitsOptions,
): void {
  const { maxConcurrent, timeoutMs } = options;
  if (maxConcurrent === undefined && timeoutMs === undefined) return;

  const gate = maxConcurrent !== undefined ? new ConcurrencyGate(maxConcurrent) : null;
  const finishers = new WeakMap<FastifyRequest, () => void>();

  const finish = (request: FastifyRequest) => {
    const done = finishers.get(request);
    if (done) {
      finishers.delete(request);
      done();
    }
  };

  app.addHook("onRequest", async (request, reply) => {
    // Watched before queueing: a client can go away while it waits
    let closed = false;
    reply.raw.once("close", () => {
      closed = true;
      finish(request);
    });

    const release = gate ? await gate.acquire() : () => {};

    if (closed) {
      release();
      reply.hijack();
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    finishers.set(request, () => {
      clearTimeout(timer);
      release();
    });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        if (reply.sent) return;
        request.log.error({ timeoutMs }, "request timed out");
        reply.code(503).send({ error: "Request timed out" });
        finish(request);
      }, timeoutMs);
      timer.unref();
    }
  });

  app.addHook("onResponse", async (request) => {
    finish(request);
  });
}
