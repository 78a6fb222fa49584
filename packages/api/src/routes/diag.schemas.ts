/**
 * Typebox schemas for the diagnostics route.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// GET /diag
// ---------------------------------------------------------------------------

export const DiagQuery = Type.Object({
  /** Any non-empty value switches to indented output; repeated, the first counts */
  pretty: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
});

export type DiagQuery = Static<typeof DiagQuery>;
