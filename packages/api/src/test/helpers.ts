/**
 * Shared test helpers. Imported by *.test.ts files only.
 */

import type { RelayConfig } from "../config.js";

/** Quiet production-style config with a fully configured upstream */
export const TEST_CONFIG: RelayConfig = {
  isDev: false,
  logLevel: "silent",
  chatling: {
    apiKey: "test-key",
    url: "https://chatling.test/v2/chat",
    modelId: 7,
    timeoutMs: 4200,
  },
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until an assertion stops throwing */
export async function waitFor(fn: () => void, timeout = 500): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      fn();
      return;
    } catch (err) {
      if (Date.now() - start > timeout) throw err;
      await sleep(10);
    }
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
