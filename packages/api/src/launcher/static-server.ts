/**
 * Static file server over a directory (the working directory by default).
 *
 * Every file under the root is readable, dotfiles included, and directories
 * get an HTML listing. There is no access control.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import serveStatic from "@fastify/static";
import { resolve } from "node:path";

import { baseServerOptions } from "../app.js";
import { loadLoggingConfig, type LoggingConfig } from "../config.js";
import { applyRequestLimits, type RequestLimitsOptions } from "../hooks/request-limits.js";

export interface StaticServerOptions extends FastifyServerOptions {
  /** Directory to serve (default: process.cwd()) */
  root?: string;
  logging?: LoggingConfig;
  /** Default: one request at a time */
  limits?: RequestLimitsOptions;
}

interface ListingEntry {
  href: string;
  name: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Plain directory index, directories first */
export function renderListing(dirs: ListingEntry[], files: ListingEntry[]): string {
  const items = [
    ...dirs.map((d) => `<li><a href="${escapeHtml(d.href)}">${escapeHtml(d.name)}/</a></li>`),
    ...files.map((f) => `<li><a href="${escapeHtml(f.href)}">${escapeHtml(f.name)}</a></li>`),
  ];
  return [
    "<!DOCTYPE html>",
    '<html><head><meta charset="utf-8"><title>Directory listing</title></head>',
    "<body><h1>Directory listing</h1><hr><ul>",
    ...items,
    "</ul><hr></body></html>",
  ].join("\n");
}

export async function buildStaticServer(
  opts?: StaticServerOptions,
): Promise<FastifyInstance> {
  const {
    root = process.cwd(),
    logging = loadLoggingConfig(),
    limits = { maxConcurrent: 1 },
    ...fastifyOpts
  } = opts ?? {};

  const app = Fastify(baseServerOptions(logging, fastifyOpts));

  // Hooks first so they cover the static routes
  applyRequestLimits(app, limits);

  await app.register(serveStatic, {
    root: resolve(root),
    prefix: "/",
    dotfiles: "allow",
    list: {
      format: "html",
      render: (dirs, files) => renderListing(dirs, files),
    },
  });

  return app;
}
