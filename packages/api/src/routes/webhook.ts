/**
 * Skill webhook: the chatbot builder POSTs a user utterance, we answer with
 * a simpleText skill response.
 *
 * Always 200. The builder shows its own error card on anything else, so
 * upstream trouble becomes the fallback text instead.
 */

import type {
  FastifyPluginAsync,
  FastifyReply,
  FastifyRequest,
} from "fastify";
import {
  EMPTY_UTTERANCE_TEXT,
  FALLBACK_TEXT,
  SKILL_CONTENT_TYPE,
  simpleText,
} from "../skill/simple-text.js";
import { extractUtterance, toRequestRecord } from "../skill/utterance.js";

/** Structured-syntax JSON types such as application/vnd.kakao+json */
const JSON_SUFFIX_TYPE = /^application\/[^\s;]+\+json(?:\s*;|$)/i;

type ParserDone = (err: Error | null, body?: unknown) => void;

/** Malformed JSON is treated as an empty payload */
function parseLenientJson(
  _request: FastifyRequest,
  body: string,
  done: ParserDone,
): void {
  try {
    done(null, JSON.parse(body));
  } catch {
    done(null, {});
  }
}

/** Anything that isn't JSON carries no utterance */
function parseAsEmpty(
  _request: FastifyRequest,
  _body: string,
  done: ParserDone,
): void {
  done(null, {});
}

function sendSkillText(reply: FastifyReply, text: string): FastifyReply {
  return reply.status(200).type(SKILL_CONTENT_TYPE).send(simpleText(text));
}

export const webhookRoutes: FastifyPluginAsync = async (app) => {
  // Parsers are encapsulated: only this plugin's routes are lenient
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, parseLenientJson);
  app.addContentTypeParser(JSON_SUFFIX_TYPE, { parseAs: "string" }, parseLenientJson);
  app.addContentTypeParser("*", { parseAs: "string" }, parseAsEmpty);

  app.post("/webhook", async (request, reply) => {
    const extracted = extractUtterance(request.body);
    app.diagnostics.recordRequest(toRequestRecord(extracted));
    request.log.info(
      { utter: extracted.utter, source: extracted.source },
      "webhook utterance",
    );

    if (!extracted.utter) {
      return sendSkillText(reply, EMPTY_UTTERANCE_TEXT);
    }

    const answer = await app.chatling.ask(extracted.utter);
    return sendSkillText(reply, answer || FALLBACK_TEXT);
  });
};
