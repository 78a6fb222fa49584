import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { DiagnosticsPayload } from "@skill-relay/shared";
import { buildApp } from "../app.js";
import { TEST_CONFIG } from "../test/helpers.js";

let app: FastifyInstance;

beforeEach(async () => {
  app = await buildApp({ logger: false, config: TEST_CONFIG });
  await app.ready();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await app.close();
});

const FRESH: DiagnosticsPayload = {
  api_key_set: true,
  chatling_url: "https://chatling.test/v2/chat",
  model_id: 7,
  body_key: "message",
  sync_budget_s: 4.2,
  last_chatling: null,
  last_request: null,
};

describe("GET /diag", () => {
  it("reports configuration and empty history on a fresh app", async () => {
    const res = await app.inject({ method: "GET", url: "/diag" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(FRESH);
    expect(res.body).not.toContain("\n");
  });

  it("indents the output when pretty is set", async () => {
    const res = await app.inject({ method: "GET", url: "/diag?pretty=1" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
    expect(res.body).toBe(JSON.stringify(FRESH, null, 2));
  });

  it("treats an empty pretty value as unset", async () => {
    const res = await app.inject({ method: "GET", url: "/diag?pretty=" });

    expect(res.body).not.toContain("\n");
  });

  it("accepts a long pretty value", async () => {
    const res = await app.inject({
      method: "GET",
      url: `/diag?pretty=${"x".repeat(40)}`,
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe(JSON.stringify(FRESH, null, 2));
  });

  it("uses the first of a repeated pretty parameter", async () => {
    const repeated = await app.inject({ method: "GET", url: "/diag?pretty=1&pretty=1" });
    expect(repeated.statusCode).toBe(200);
    expect(repeated.body).toBe(JSON.stringify(FRESH, null, 2));

    const emptyFirst = await app.inject({ method: "GET", url: "/diag?pretty=&pretty=1" });
    expect(emptyFirst.statusCode).toBe(200);
    expect(emptyFirst.body).toBe(JSON.stringify(FRESH));
  });

  it("shows the last upstream call and webhook request", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response('{"data":{"response":"네"}}', { status: 200 }),
    );
    await app.inject({
      method: "POST",
      url: "/webhook",
      payload: { action: { params: { usrtext: "예약 돼요?" } } },
    });

    const res = await app.inject({ method: "GET", url: "/diag" });
    const body = res.json();

    expect(body.last_chatling).toEqual({
      ok: true,
      status: 200,
      url: "https://chatling.test/v2/chat",
      body_snippet: '{"data":{"response":"네"}}',
    });
    expect(body.last_request).toMatchObject({
      utter: "예약 돼요?",
      source: "action.params.usrtext",
      raw_usrtext: "예약 돼요?",
      raw_utterance: null,
    });
  });

  it("never exposes the API key", async () => {
    const res = await app.inject({ method: "GET", url: "/diag" });

    expect(res.body).not.toContain(TEST_CONFIG.chatling.apiKey);
  });
});
