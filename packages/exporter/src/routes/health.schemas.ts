/**
 * Typebox schemas for the health route.
 */

import { Type, type Static } from "@sinclair/typebox";

export const HealthResponse = Type.Object({
  status: Type.Union([
    Type.Literal("running"),
    Type.Literal("degraded"),
    Type.Literal("terminated"),
  ]),
  address: Type.String(),
  consecutiveFailures: Type.Integer({ minimum: 0 }),
  lastCheckedAt: Type.Union([Type.String(), Type.Null()]),
  reason: Type.Optional(Type.String()),
});

export type HealthResponse = Static<typeof HealthResponse>;
