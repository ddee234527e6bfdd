/**
 * Typebox schemas for the stats API route.
 *
 * Used as Fastify response schemas, so they must list every field of
 * UsageSnapshot: the serializer drops anything not declared here.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Reusable fragments
// ---------------------------------------------------------------------------

const DailyCount = Type.Object({
  date: Type.String(),
  count: Type.Integer(),
});

const Summary = {
  count: Type.Integer(),
  mean: Type.Number(),
  stdDev: Type.Number(),
};

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const UsageSnapshotResponse = Type.Object({
  uniqueUsersPerDay: Type.Array(DailyCount),
  uniqueUsers: Type.Object(Summary),
  messagesPerUser: Type.Object(Summary),
  topUsers: Type.Array(
    Type.Object({
      userId: Type.String(),
      count: Type.Integer(),
    }),
  ),
  messagesPerModelPerDay: Type.Array(
    Type.Object({
      model: Type.String(),
      date: Type.String(),
      count: Type.Integer(),
    }),
  ),
  models: Type.Array(Type.Object({ model: Type.String(), ...Summary })),
  newUsersPerDay: Type.Array(DailyCount),
  totals: Type.Object({
    users: Type.Integer(),
    conversations: Type.Integer(),
    messages: Type.Integer(),
  }),
  usersByFaculty: Type.Array(
    Type.Object({
      faculty: Type.String(),
      count: Type.Integer(),
    }),
  ),
  stdDevMode: Type.Union([Type.Literal("population"), Type.Literal("sample")]),
  collectedAt: Type.String({ format: "date-time" }),
  durationMs: Type.Number(),
});

export type UsageSnapshotResponse = Static<typeof UsageSnapshotResponse>;

export const ErrorResponse = Type.Object({
  error: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponse>;
