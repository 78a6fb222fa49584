/**
 * In-memory record of the most recent upstream call and webhook request,
 * served by GET /diag. Lives as long as the app instance.
 */

import type {
  ChatlingCallRecord,
  WebhookRequestRecord,
} from "@skill-relay/shared";

export interface DiagnosticsSnapshot {
  lastChatling: ChatlingCallRecord | null;
  lastRequest: WebhookRequestRecord | null;
}

export class DiagnosticsStore {
  private lastChatling: ChatlingCallRecord | null = null;
  private lastRequest: WebhookRequestRecord | null = null;

  recordChatling(record: ChatlingCallRecord): void {
    this.lastChatling = record;
  }

  recordRequest(record: WebhookRequestRecord): void {
    this.lastRequest = record;
  }

  snapshot(): DiagnosticsSnapshot {
    return {
      lastChatling: this.lastChatling,
      lastRequest: this.lastRequest,
    };
  }
}
