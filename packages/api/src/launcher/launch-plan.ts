/**
 * Launch plan resolution: which server, on which address, with which limits.
 */

import type { LaunchPlan, LaunchVariant, ServerTuning } from "@skill-relay/shared";
import type { Env } from "../config.js";
import { LaunchConfigError } from "../errors.js";

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 8080;

/** One worker with two threads, 30s timeout, 10s graceful window, 65s keep-alive */
export const MANAGED_TUNING: ServerTuning = {
  maxConcurrentRequests: 2,
  requestTimeoutMs: 30_000,
  gracefulShutdownMs: 10_000,
  keepAliveMs: 65_000,
};

export const DIRECT_TUNING: ServerTuning = {};

/** One request at a time, nothing else */
export const STATIC_TUNING: ServerTuning = {
  maxConcurrentRequests: 1,
};

interface VariantRules {
  /** PORT must be set explicitly */
  requiresPort: boolean;
  tuning: ServerTuning;
}

const VARIANTS: Record<LaunchVariant, VariantRules> = {
  managed: { requiresPort: true, tuning: MANAGED_TUNING },
  direct: { requiresPort: false, tuning: DIRECT_TUNING },
  static: { requiresPort: false, tuning: STATIC_TUNING },
};

function isVariant(value: string): value is LaunchVariant {
  return Object.hasOwn(VARIANTS, value);
}

/** No argument means `managed`, the image's default command */
export function parseVariant(arg: string | undefined): LaunchVariant {
  if (arg === undefined || arg === "") return "managed";
  if (!isVariant(arg)) {
    throw new LaunchConfigError(
      `Unknown launch variant "${arg}". Expected one of: ${Object.keys(VARIANTS).join(", ")}.`,
    );
  }
  return arg;
}

export function parsePort(raw: string | undefined, required: boolean): number {
  if (raw == null || raw.trim() === "") {
    if (required) {
      throw new LaunchConfigError("PORT is required and has no default for this variant.");
    }
    return DEFAULT_PORT;
  }

  const value = raw.trim();
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new LaunchConfigError(
      `Invalid PORT value "${raw}". Expected an integer between 0 and 65535.`,
    );
  }
  return port;
}

export function resolveLaunchPlan(variant: LaunchVariant, env: Env): LaunchPlan {
  const rules = VARIANTS[variant];
  return {
    variant,
    host: env.HOST?.trim() || DEFAULT_HOST,
    port: parsePort(env.PORT, rules.requiresPort),
    tuning: rules.tuning,
  };
}
