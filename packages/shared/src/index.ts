export type {
  LaunchVariant,
  LauncherState,
  ServerTuning,
  LaunchPlan,
} from "./types/launcher.js";
export type {
  SimpleTextOutput,
  SkillResponse,
  UtteranceSource,
} from "./types/skill.js";
export type {
  ChatlingResponseRecord,
  ChatlingFailureRecord,
  ChatlingCallRecord,
  WebhookRequestRecord,
  DiagnosticsPayload,
} from "./types/diagnostics.js";
