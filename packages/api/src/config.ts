/**
 * Environment configuration for the relay.
 *
 * Read once at startup. PORT and HOST are not handled here: their rules
 * depend on the launch variant, see launcher/launch-plan.ts.
 */

import { ConfigError } from "./errors.js";

/** Placeholder chatbot endpoint; deployments set CHATLING_URL */
export const DEFAULT_CHATLING_URL =
  "https://api.chatling.ai/v2/chatbots/0000000000/ai/kb/chat";

/** Seconds. Stays under the chatbot platform's 5s webhook budget. */
export const DEFAULT_CHATLING_TIMEOUT_S = 4.2;

export interface ChatlingConfig {
  apiKey: string;
  url: string;
  /** Numeric model id required by the v2 API; null when unset or unparsable */
  modelId: number | null;
  timeoutMs: number;
}

export interface LoggingConfig {
  /** True unless NODE_ENV=production */
  isDev: boolean;
  logLevel: string;
}

export interface RelayConfig extends LoggingConfig {
  chatling: ChatlingConfig;
}

export type Env = Record<string, string | undefined>;

const INTEGER_RE = /^[+-]?\d+$/;

/** Parse CHATLING_MODEL_ID. Anything that isn't an integer counts as unset. */
export function parseModelId(raw: string | undefined): number | null {
  const value = raw?.trim() ?? "";
  if (!INTEGER_RE.test(value)) return null;
  return Number.parseInt(value, 10);
}

/** Parse CHATLING_TIMEOUT (seconds) into milliseconds */
export function parseTimeoutMs(raw: string | undefined): number {
  const value = raw?.trim() ?? "";
  if (value === "") return Math.round(DEFAULT_CHATLING_TIMEOUT_S * 1000);

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(
      "CHATLING_TIMEOUT",
      `Invalid CHATLING_TIMEOUT value "${raw}". Expected a positive number of seconds.`,
    );
  }
  return Math.round(seconds * 1000);
}

/** The part of the config that cannot fail, so startup errors can be logged */
export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  return {
    isDev: env.NODE_ENV !== "production",
    logLevel: env.LOG_LEVEL?.trim() || "info",
  };
}

export function loadConfig(env: Env = process.env): RelayConfig {
  return {
    ...loadLoggingConfig(env),
    chatling: {
      apiKey: env.CHATLING_API_KEY?.trim() ?? "",
      url: env.CHATLING_URL?.trim() || DEFAULT_CHATLING_URL,
      modelId: parseModelId(env.CHATLING_MODEL_ID),
      timeoutMs: parseTimeoutMs(env.CHATLING_TIMEOUT),
    },
  };
}
