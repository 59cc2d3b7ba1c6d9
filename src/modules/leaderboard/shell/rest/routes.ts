/**
 * Leaderboard REST Routes
 *
 * Read-only standings for web widgets and dashboards.
 */

import {
  GetLeaderboardQuerySchema,
  GetLeaderboardResponseSchema,
  ErrorResponseSchema,
  type GetLeaderboardQuery,
} from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { getLeaderboard } from '../../core/usecases/get-leaderboard.js';
import { DEFAULT_LEADERBOARD_LIMIT } from '../../core/types.js';

import type { LeaderboardRepository } from '../../core/ports.js';
import type { UserRepository } from '../../../users/index.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeLeaderboardRoutesDeps {
  leaderboardRepo: LeaderboardRepository;
  userRepo: UserRepository;
}

export const makeLeaderboardRoutes = (deps: MakeLeaderboardRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/leaderboard - Top standings of a period
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: GetLeaderboardQuery }>(
      '/api/v1/leaderboard',
      {
        schema: {
          querystring: GetLeaderboardQuerySchema,
          response: {
            200: GetLeaderboardResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { period = 'all_time', limit = DEFAULT_LEADERBOARD_LIMIT, userId } = request.query;

        const result = await getLeaderboard(deps, {
          period,
          limit,
          ...(userId !== undefined && { requestingUserId: userId }),
        });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
