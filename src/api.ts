/**
 * Bot server entry point
 * Wires storage, content, the conversation engine and the scheduler, then
 * starts the HTTP server that receives Telegram updates.
 */

import { Redis } from 'ioredis';

import { buildApp } from './app/build-app.js';
import { createKeyedMutex } from './common/utils/keyed-mutex.js';
import { parseEnv, createConfig, type EnvWarning } from './infra/config/env.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger } from './infra/logger/index.js';
import { makeQueueClient, type QueueClient } from './infra/queue/client.js';
import { makeAnalyticsRepo } from './modules/analytics/index.js';
import { createContentCatalog, loadContentBundle } from './modules/content/index.js';
import {
  createConversationEngine,
  makeTelegramClient,
  makeTelegramGateway,
} from './modules/conversation/index.js';
import {
  makeDbHealthChecker,
  makeRedisHealthChecker,
  type HealthChecker,
} from './modules/health/index.js';
import { makeLeaderboardRepo, type LeaderboardPeriod } from './modules/leaderboard/index.js';
import { cryptoHasher, hrtimeTimestamp, makeReferralRepo } from './modules/referral/index.js';
import { makeReportRepo } from './modules/reports/index.js';
import { startScheduler } from './modules/scheduler/index.js';
import { createMemorySessionStore } from './modules/session/index.js';
import { makeUserRepo, type UserId } from './modules/users/index.js';

const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  const warnings: EnvWarning[] = [];
  const env = parseEnv(process.env, warnings);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'scamsense-bot',
    pretty: config.logger.pretty,
  });

  for (const warning of warnings) {
    logger.warn({ variable: warning.variable }, warning.message);
  }

  logger.info({ config: { server: config.server, game: config.game } }, 'Starting bot server');

  // ───────────────────────────────────────────────────────────────────────────
  // Content
  // ───────────────────────────────────────────────────────────────────────────
  const bundle = await loadContentBundle(config.game.contentDir);
  if (bundle.isErr()) {
    logger.fatal({ error: bundle.error }, 'Failed to load game content');
    process.exit(1);
  }
  const content = createContentCatalog(bundle.value);
  logger.info(
    { dir: config.game.contentDir, levels: content.listLevels().length },
    'Game content loaded'
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Storage
  // ───────────────────────────────────────────────────────────────────────────
  const db = initDatabase(config);
  const userRepo = makeUserRepo({ db, logger });
  const leaderboardRepo = makeLeaderboardRepo({ db, logger });
  const referralRepo = makeReferralRepo({ db, logger });
  const analyticsRepo = makeAnalyticsRepo({ db, logger });
  const reportRepo = makeReportRepo({ db, logger });

  const periodLock = createKeyedMutex<LeaderboardPeriod>();
  const userLock = createKeyedMutex<UserId>();
  const ledger = { userRepo, leaderboardRepo, periodLock, logger };

  const sessions = createMemorySessionStore({
    idleTtlMs: config.sessions.idleTtlMs,
    maxEntries: config.sessions.maxEntries,
  });
  const sweepTimer = setInterval(() => {
    const removed = sessions.sweep();
    if (removed > 0) {
      logger.debug({ removed, remaining: sessions.size }, 'Expired sessions removed');
    }
  }, SESSION_SWEEP_INTERVAL_MS);
  sweepTimer.unref();

  // ───────────────────────────────────────────────────────────────────────────
  // Conversation
  // ───────────────────────────────────────────────────────────────────────────
  const telegram = makeTelegramClient({
    botToken: config.telegram.botToken,
    apiBaseUrl: config.telegram.apiBaseUrl,
    logger,
  });

  const gateway = makeTelegramGateway({ client: telegram });

  const engine = createConversationEngine({
    sessions,
    content,
    gateway,
    ledger,
    referrals: { referralRepo, hasher: cryptoHasher, now: hrtimeTimestamp },
    analytics: { analyticsRepo, logger },
    reports: reportRepo,
    userLock,
    settings: {
      quizPassThreshold: config.game.quizPassThreshold,
      adminIds: config.telegram.adminIds,
      ...(config.telegram.botUsername !== undefined && {
        botUsername: config.telegram.botUsername,
      }),
    },
    logger,
  });

  const healthCheckers: HealthChecker[] = [makeDbHealthChecker(db)];

  // ───────────────────────────────────────────────────────────────────────────
  // Scheduled jobs (optional: need Redis)
  // ───────────────────────────────────────────────────────────────────────────
  let redis: Redis | undefined;
  let queueClient: QueueClient | undefined;

  if (config.redis.url !== undefined) {
    // BullMQ workers need blocking commands without a retry limit
    redis = new Redis(config.redis.url, { maxRetriesPerRequest: null });
    queueClient = makeQueueClient({ redis, prefix: config.redis.prefix, logger });
    healthCheckers.push(makeRedisHealthChecker(redis));

    await startScheduler({
      queueClient,
      deps: {
        leaderboardRepo,
        analyticsRepo,
        periodLock,
        userRepo,
        content,
        gateway,
        sessions,
        logger,
      },
    });
  } else {
    logger.warn('REDIS_URL not configured - scheduled jobs are disabled');
  }

  // ───────────────────────────────────────────────────────────────────────────
  // HTTP
  // ───────────────────────────────────────────────────────────────────────────
  const app = await buildApp({
    config,
    logger,
    deps: { engine, leaderboardRepo, userRepo, healthCheckers },
    version: getVersion(),
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    clearInterval(sweepTimer);

    try {
      await app.close();
      await queueClient?.close();
      await redis?.quit();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
