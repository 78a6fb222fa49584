/**
 * Stop-signal handling.
 *
 * With a graceful window the server stops accepting connections and
 * in-flight requests get up to that long to finish; after that the process
 * exits regardless. Without one the process exits at once.
 */

import type { FastifyBaseLogger } from "fastify";

export type CloseOutcome = "graceful" | "forced";

export interface Closable {
  close(): PromiseLike<unknown>;
}

/**
 * Close `server`, giving up after `graceMs`.
 * Resolves "forced" when the window ran out first; the close carries on in
 * the background.
 */
export async function closeWithin(
  server: Closable,
  graceMs: number,
): Promise<CloseOutcome> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<CloseOutcome>((resolve) => {
    timer = setTimeout(() => resolve("forced"), graceMs);
  });
  const closed = Promise.resolve(server.close()).then((): CloseOutcome => "graceful");

  try {
    return await Promise.race([closed, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface ShutdownOptions {
  /** Graceful window; undefined exits immediately */
  graceMs?: number;
  signals?: NodeJS.Signals[];
  /** Default: process.exit */
  exit?: (code: number) => void;
}

/**
 * Install one-shot stop-signal handlers for `server`.
 * Returns a function that removes them.
 */
export function installShutdownHandlers(
  server: Closable & { log: FastifyBaseLogger },
  options: ShutdownOptions = {},
): () => void {
  const {
    graceMs,
    signals = ["SIGTERM", "SIGINT"],
    exit = (code: number) => process.exit(code),
  } = options;

  const onSignal = (signal: NodeJS.Signals) => {
    server.log.info({ signal, graceMs }, "stop signal received");

    if (graceMs === undefined) {
      exit(0);
      return;
    }

    closeWithin(server, graceMs).then(
      (outcome) => {
        if (outcome === "forced") {
          server.log.warn({ graceMs }, "graceful shutdown window elapsed, exiting");
        }
        exit(0);
      },
      (err: unknown) => {
        server.log.error({ err }, "shutdown failed");
        exit(1);
      },
    );
  };

  for (const signal of signals) {
    process.once(signal, onSignal);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
  };
}
