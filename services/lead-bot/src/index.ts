import type { Redis } from 'ioredis';
import { loadConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { loadLocales } from './lib/localization.js';
import { LeadDispatcher } from './lib/leadDispatcher.js';
import { TelegramLeadNotifier } from './lib/leadNotifier.js';
import { RateLimiter } from './lib/rateLimiter.js';
import { createRedisClient } from './lib/redis.js';
import { GoogleSpreadsheetClient, LeadsSheet } from './lib/sheets.js';
import { LeadBot, createTelegramBot, registerHandlers } from './bot.js';
import { startServer } from './server.js';
import { startSessionCleanupCron } from './cron/sessionCleanup.js';
import {
  DialogEngine,
  MemorySessionStore,
  RedisSessionStore,
  SURVEY_CATALOGUE,
  createStepRegistry,
  type SessionStore,
} from './survey/index.js';

const logger = createLogger({ module: 'main' });

async function main() {
  logger.info('Starting lead-bot...');

  const config = loadConfig();

  // 1. Survey: locales + step catalogue, checked before anything connects
  const localization = loadLocales(config.localesDir ?? undefined);
  const registry = createStepRegistry(SURVEY_CATALOGUE);
  registry.validate(localization);
  logger.info({ steps: registry.steps().length, languages: localization.languages() }, 'Survey catalogue valid');

  const defaults = { entryStepId: registry.entryStepId(), defaultLanguage: config.defaultLanguage };
  let redis: Redis | null = null;
  let store: SessionStore;
  if (config.sessionStore === 'redis') {
    redis = createRedisClient(config.redisUrl);
    store = new RedisSessionStore(redis, defaults, config.sessionIdleMs);
  } else {
    store = new MemorySessionStore(defaults);
  }
  logger.info({ store: config.sessionStore }, 'Session store ready');

  const engine = new DialogEngine({
    registry,
    store,
    localization,
    defaultLanguage: config.defaultLanguage,
    idleTimeoutMs: config.sessionIdleMs,
  });

  // 2. Telegram bot (polling) + collaborators
  const bot = createTelegramBot(config.telegramBotToken);
  const me = await bot.getMe();
  logger.info({ username: me.username, id: me.id }, 'Bot connected');

  const exportOptions = {
    registry,
    localization,
    exportLanguage: config.exportLanguage,
    timezone: config.timezone,
  };
  const leadsSheet = new LeadsSheet(
    GoogleSpreadsheetClient.fromServiceAccount(config.googleServiceAccountFile, config.spreadsheetId),
    { localization, exportLanguage: config.exportLanguage, timezone: config.timezone },
  );
  const notifier = new TelegramLeadNotifier(bot, config.staffChatId, localization, config.exportLanguage);
  const dispatcher = new LeadDispatcher(leadsSheet, notifier, exportOptions);
  const rateLimiter = new RateLimiter(config.rateLimits);

  registerHandlers(bot, new LeadBot({
    bot,
    engine,
    dispatcher,
    statusUpdater: leadsSheet,
    localization,
    rateLimiter,
    config,
  }));

  // 3. HTTP server (health + website leads)
  const server = await startServer(config.port, {
    webhook: config.webhookEnabled
      ? { secret: config.webhookSecret, registry, dispatcher }
      : null,
  });

  // 4. Cron (idle sessions)
  const cronTask = startSessionCleanupCron(config.sessionCleanupSchedule, engine, rateLimiter);

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    cronTask.stop();
    await bot.stopPolling();
    await server.close();
    if (redis) await redis.quit();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(err => {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  logger.info('lead-bot is ready');
}

main().catch(err => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err), stack: err instanceof Error ? err.stack : undefined }, 'Failed to start');
  process.exit(1);
});
