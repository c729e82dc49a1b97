/**
 * Typebox schemas for the status routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// GET /targets
// ---------------------------------------------------------------------------

export const TargetsQuery = Type.Object({
  /** Only return target groups whose `job` label equals this */
  job: Type.Optional(Type.String({ minLength: 1, maxLength: 256 })),
});

export type TargetsQuery = Static<typeof TargetsQuery>;
