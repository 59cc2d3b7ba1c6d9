/**
 * Fastify application factory
 * Registers the HTTP surface: Telegram webhook, leaderboard API and health checks.
 */

import fastifyLib, {
  type FastifyBaseLogger,
  type FastifyError,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';

import { registerSecurityHeaders } from '../infra/plugins/security-headers.js';
import { makeTelegramWebhookRoutes, type ConversationEngine } from '../modules/conversation/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeLeaderboardRoutes, type LeaderboardRepository } from '../modules/leaderboard/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { UserRepository } from '../modules/users/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies, built by the entry point or by tests
 */
export interface AppDeps {
  engine: ConversationEngine;
  leaderboardRepo: LeaderboardRepository;
  userRepo: UserRepository;
  healthCheckers?: HealthChecker[];
}

export interface AppOptions {
  config: AppConfig;
  deps: AppDeps;
  logger: Logger;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application.
 * This is the composition root of the HTTP layer.
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { config, deps, logger, version } = options;

  const app = fastifyLib<
    RawServerDefault,
    RawRequestDefaultExpression,
    RawReplyDefaultExpression,
    FastifyBaseLogger
  >({
    loggerInstance: logger.child({ component: 'http' }),
    disableRequestLogging: config.server.isTest,
  });

  if (!config.server.isTest) {
    await registerSecurityHeaders(app, config);
  }

  // Set before any route plugin so their routes pick it up
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeTelegramWebhookRoutes({
      engine: deps.engine,
      webhookSecret: config.telegram.webhookSecret,
      logger,
    })
  );

  await app.register(
    makeLeaderboardRoutes({
      leaderboardRepo: deps.leaderboardRepo,
      userRepo: deps.userRepo,
    })
  );

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and await all plugins
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
