import type { SkillResponse } from "@skill-relay/shared";

export const SKILL_CONTENT_TYPE = "application/json; charset=utf-8";

/** Shown when the webhook arrives without an utterance */
export const EMPTY_UTTERANCE_TEXT = "질문을 입력해 주세요 🙂";

/** Shown when the upstream call fails or times out */
export const FALLBACK_TEXT =
  "지금은 답변 서버가 혼잡해요. 잠시 뒤에 다시 시도해 주세요.";

/** Wrap a plain text reply in the skill response template */
export function simpleText(text: string): SkillResponse {
  return {
    version: "2.0",
    template: {
      outputs: [{ simpleText: { text } }],
    },
  };
}
