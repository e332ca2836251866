import http from 'http';
import { webhookCallback } from 'grammy';
import { logger } from './utils/logger.js';
import { config } from './config/index.js';
import { connectDatabase, disconnectDatabase, type SqliteDatabase } from './database/connection.js';
import { WriteQueue } from './database/write-queue.js';
import { applyMigrations } from './database/schema.js';
import { bot, setBotCommands, startBot, stopBot } from './bot/bot.js';
import { DIContainer } from './shared/di/container.js';
import type { AdminDirectoryService } from './core/auth/admin-directory.service.js';

// Import handlers to register them
import './bot/handlers/command.handler.js';
import './bot/handlers/callback.handler.js';
import './bot/handlers/message.handler.js';

const WEBHOOK_PATH = '/webhook';

let server: http.Server | null = null;
let db: SqliteDatabase | null = null;
let queue: WriteQueue | null = null;

async function main(): Promise<void> {
  logger.info('Starting forum post admin bot...');
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Timezone: ${config.timezone}`);

  db = connectDatabase(config.dbPath);
  queue = new WriteQueue(db);

  const applied = await applyMigrations(queue);
  logger.info(`Database ready, ${applied.length} migration(s) applied`);

  DIContainer.initialize(bot.api, queue, config);
  logger.info('DI Container initialized with all services');

  const directory = DIContainer.resolve<AdminDirectoryService>('AdminDirectoryService');
  await directory.seedFromEnvironment({
    adminIds: config.adminIds,
    forumChatId: config.forumChatId,
    topicId: config.topicId,
  });
  if (directory.listAdmins().length === 0) {
    logger.warn('No admins configured, every update will be ignored. Set ADMIN_IDS.');
  }

  await setBotCommands();

  const healthResponse = JSON.stringify({ status: 'ok', service: 'forum-post-admin-bot' });
  const notFoundResponse = JSON.stringify({ error: 'Not found' });

  if (config.webhookUrl) {
    logger.info(`Setting up webhook at ${config.webhookUrl}${WEBHOOK_PATH}`);
    await bot.api.setWebhook(`${config.webhookUrl}${WEBHOOK_PATH}`);
  } else {
    logger.warn('No WEBHOOK_URL provided, using long polling');
  }

  const handleWebhook = webhookCallback(bot, 'http');

  server = http.createServer(async (req, res) => {
    if (config.webhookUrl && req.url === WEBHOOK_PATH && req.method === 'POST') {
      try {
        await handleWebhook(req, res);
      } catch (error) {
        logger.error('Error handling webhook:', error);
        res.writeHead(500);
        res.end();
      }
      return;
    }

    const isHealthEndpoint = req.url === '/health' || req.url === '/';
    res.writeHead(isHealthEndpoint ? 200 : 404, { 'Content-Type': 'application/json' });
    res.end(isHealthEndpoint ? healthResponse : notFoundResponse);
  });

  server.listen(config.port, () => {
    logger.info(`Server listening on port ${config.port}`);

    if (!config.webhookUrl) {
      logger.info('Starting long polling...');
      startBot().catch((error: unknown) => {
        logger.error('Error in long polling:', error);
      });
    }
  });

  logger.info('Bot is running...');
}

// Graceful shutdown
async function shutdown(): Promise<void> {
  logger.info('Shutting down gracefully...');

  try {
    if (!config.webhookUrl && bot.isRunning()) {
      await stopBot();
    }

    if (server) {
      await new Promise<void>((resolve) => {
        server?.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
      });
    }

    // Pending writes finish before the connection goes away
    if (queue) {
      await queue.close();
    }
    if (db) {
      disconnectDatabase(db);
    }

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown();
});
process.on('SIGINT', () => {
  void shutdown();
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
});

main().catch((error: unknown) => {
  logger.error('Failed to start bot:', error);
  process.exit(1);
});
