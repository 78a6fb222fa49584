/**
 * Chatling Module
 *
 * Outbound calls to the knowledge-base chat API. Knows nothing about
 * Fastify or the webhook payload format.
 */

export { ChatlingClient, extractAnswer, snippetOf, BODY_KEY } from "./chatling-client.js";
export type { ChatlingClientOptions } from "./chatling-client.js";
