import 'dotenv/config';
import gracefulShutdown from 'http-graceful-shutdown';
import { buildContext } from './context.js';
import { loadConfig } from './lib/env.js';
import { createLogger } from './lib/logger.js';
import { createPool, migrate } from './services/db.js';
import { PgMessageRepository } from './services/messageRepository.js';
import { SocketNotifier } from './services/notifier.js';
import { createServer } from './server.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandled rejection');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'uncaught exception');
  });

  const pool = createPool(config.databaseUrl);
  await migrate(pool);

  const notifier = new SocketNotifier();
  const ctx = buildContext(config, {
    repository: new PgMessageRepository(pool),
    notifier,
    logger
  });
  const { httpServer } = createServer(ctx, { notifier });

  ctx.dispatcher.start();
  httpServer.listen(config.port, config.host, () => {
    logger.info(
      { port: config.port, webhookPath: config.webhookPath, relay: ctx.relay.configured, model: config.model },
      'responder listening'
    );
  });

  gracefulShutdown(httpServer, {
    signals: 'SIGINT SIGTERM',
    timeout: 30_000,
    onShutdown: async () => {
      await ctx.dispatcher.stop();
      await pool.end();
    },
    finally: () => logger.info('responder stopped')
  });
}

main().catch((err) => {
  // config may not have loaded, so fall back to LOG_LEVEL or info
  createLogger().fatal({ err }, 'responder failed to start');
  process.exit(1);
});
