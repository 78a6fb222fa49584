/**
 * Chatling v2 knowledge-base chat client.
 *
 * Sends a single user message and pulls an answer string out of whatever
 * JSON shape comes back. Every call outcome is written to the diagnostics
 * store; callers only see the answer or null.
 */

import type { BaseLogger } from "pino";
import type { ChatlingCallRecord } from "@skill-relay/shared";
import type { ChatlingConfig } from "../config.js";
import type { DiagnosticsStore } from "../diagnostics/diagnostics-store.js";

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

/** Body key the v2 API expects the user message under */
export const BODY_KEY = "message";

const SNIPPET_LENGTH = 200;

/** Checked in order, inside `data` when present */
const ANSWER_KEYS = ["response", "answer", "text", "message"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First SNIPPET_LENGTH characters (code points, not UTF-16 units) */
export function snippetOf(text: string): string {
  return Array.from(text).slice(0, SNIPPET_LENGTH).join("");
}

/**
 * Pick the answer out of a parsed response body.
 * Common shape: {"status":"success","data":{"response":"..."}}.
 * Falls back to the raw body snippet.
 */
export function extractAnswer(body: unknown, snippet: string): string {
  if (isRecord(body)) {
    const data = "data" in body ? body.data : body;
    if (isRecord(data)) {
      for (const key of ANSWER_KEYS) {
        const value = data[key];
        if (typeof value === "string") return value.trim();
      }
    }
  }
  return snippet;
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ChatlingClientOptions {
  /** Receives a record of every call */
  diagnostics?: DiagnosticsStore;
  logger?: Pick<BaseLogger, "warn">;
}

export class ChatlingClient {
  private config: ChatlingConfig;
  private diagnostics?: DiagnosticsStore;
  private logger?: ChatlingClientOptions["logger"];

  constructor(config: ChatlingConfig, options?: ChatlingClientOptions) {
    this.config = config;
    this.diagnostics = options?.diagnostics;
    this.logger = options?.logger;
  }

  get apiKeySet(): boolean {
    return this.config.apiKey !== "";
  }

  get url(): string {
    return this.config.url;
  }

  get modelId(): number | null {
    return this.config.modelId;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Ask the knowledge base a question.
   * Returns null when unconfigured, on non-2xx, timeout or network failure.
   */
  async ask(message: string): Promise<string | null> {
    const { apiKey, url, modelId, timeoutMs } = this.config;

    if (!apiKey) {
      this.record({ ok: false, status: 0, error: "no_api_key" });
      return null;
    }
    // 0 is not a valid model id
    if (!modelId) {
      this.record({ ok: false, status: 0, error: "no_model_id" });
      return null;
    }

    try {
      const res = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ [BODY_KEY]: message, ai_model_id: modelId }),
        signal: AbortSignal.timeout(timeoutMs),
      });

      const text = await res.text();
      const snippet = snippetOf(text);
      this.record({ ok: res.ok, status: res.status, url, body_snippet: snippet });

      if (!res.ok) {
        this.logger?.warn(
          { status: res.status, snippet },
          "Chatling returned non-2xx",
        );
        return null;
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        // Not JSON: hand back the raw text
        return snippet;
      }
      return extractAnswer(body, snippet);
    } catch (error) {
      if (isTimeout(error)) {
        this.record({ ok: false, status: 0, error: "timeout" });
      } else {
        this.record({
          ok: false,
          status: 0,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return null;
    }
  }

  private record(record: ChatlingCallRecord): void {
    this.diagnostics?.recordChatling(record);
  }
}
