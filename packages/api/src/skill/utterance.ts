/**
 * Utterance extraction from skill webhook payloads.
 *
 * The payload is never validated as a whole: builders send many optional
 * blocks, and a missing or oddly shaped one must not fail the request.
 */

import type { UtteranceSource, WebhookRequestRecord } from "@skill-relay/shared";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a nested property, yielding undefined past any non-object */
function dig(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export interface ExtractedUtterance {
  utter: string;
  source: UtteranceSource;
  rawUsrtext: unknown;
  rawUtterance: unknown;
}

/**
 * Prefer the `usrtext` action parameter (set by a block's parameter
 * mapping), then the raw `userRequest.utterance`.
 */
export function extractUtterance(payload: unknown): ExtractedUtterance {
  const rawUsrtext = dig(payload, "action", "params", "usrtext");
  const rawUtterance = dig(payload, "userRequest", "utterance");

  const usrtext = typeof rawUsrtext === "string" ? rawUsrtext : "";
  const utterance = typeof rawUtterance === "string" ? rawUtterance : "";

  return {
    utter: (usrtext || utterance).trim(),
    source: usrtext ? "action.params.usrtext" : "userRequest.utterance",
    rawUsrtext,
    rawUtterance,
  };
}

export function toRequestRecord(
  extracted: ExtractedUtterance,
  now: Date = new Date(),
): WebhookRequestRecord {
  return {
    utter: extracted.utter,
    source: extracted.source,
    raw_usrtext: extracted.rawUsrtext ?? null,
    raw_utterance: extracted.rawUtterance ?? null,
    ts: now.toISOString(),
  };
}
