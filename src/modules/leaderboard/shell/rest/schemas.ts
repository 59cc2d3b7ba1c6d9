/**
 * Leaderboard REST API Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DEFAULT_LEADERBOARD_LIMIT, MAX_LEADERBOARD_LIMIT } from '../../core/types.js';

export const LeaderboardPeriodSchema = Type.Union([
  Type.Literal('all_time'),
  Type.Literal('weekly'),
  Type.Literal('monthly'),
]);

export const GetLeaderboardQuerySchema = Type.Object(
  {
    period: Type.Optional(LeaderboardPeriodSchema),
    limit: Type.Optional(
      Type.Integer({ minimum: 1, maximum: MAX_LEADERBOARD_LIMIT, default: DEFAULT_LEADERBOARD_LIMIT })
    ),
    userId: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export type GetLeaderboardQuery = Static<typeof GetLeaderboardQuerySchema>;

const LeaderboardRowSchema = Type.Object({
  rank: Type.Integer(),
  userId: Type.Integer(),
  displayName: Type.String(),
  score: Type.Integer(),
});

export const GetLeaderboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    period: LeaderboardPeriodSchema,
    entries: Type.Array(LeaderboardRowSchema),
    totalPlayers: Type.Integer(),
    requester: Type.Union([
      Type.Object({
        rank: Type.Integer(),
        score: Type.Integer(),
        percentile: Type.Number(),
      }),
      Type.Null(),
    ]),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
