/** A single output block of a skill response */
export interface SimpleTextOutput {
  simpleText: { text: string };
}

/** Skill response body as the chatbot builder expects it */
export interface SkillResponse {
  version: "2.0";
  template: {
    outputs: SimpleTextOutput[];
  };
}

/** Where the webhook found the user's utterance */
export type UtteranceSource = "action.params.usrtext" | "userRequest.utterance";
