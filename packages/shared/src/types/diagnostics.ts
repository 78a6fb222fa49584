import type { UtteranceSource } from "./skill.js";

/** Outcome of the last upstream chat call that got an HTTP response */
export interface ChatlingResponseRecord {
  ok: boolean;
  status: number;
  url: string;
  body_snippet: string;
}

/** Outcome of the last upstream chat call that never got a response */
export interface ChatlingFailureRecord {
  ok: false;
  status: 0;
  error: string;
}

export type ChatlingCallRecord = ChatlingResponseRecord | ChatlingFailureRecord;

/** The last webhook request as the relay saw it */
export interface WebhookRequestRecord {
  utter: string;
  source: UtteranceSource;
  raw_usrtext: unknown;
  raw_utterance: unknown;
  /** ISO-8601 timestamp */
  ts: string;
}

/** GET /diag response body */
export interface DiagnosticsPayload {
  api_key_set: boolean;
  chatling_url: string;
  model_id: number | null;
  body_key: "message";
  /** Upstream timeout in seconds */
  sync_budget_s: number;
  last_chatling: ChatlingCallRecord | null;
  last_request: WebhookRequestRecord | null;
}
