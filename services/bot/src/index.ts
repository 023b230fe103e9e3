import type { Server } from 'node:http';
import { config } from './config.js';
import { logger } from './logger.js';
import { closeDb, initDb } from './db/schema.js';
import { bootstrapAdmins } from './services/admin-registry.service.js';
import { storeAnalysis } from './services/analysis.service.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import { createTelegramBot } from './transport/telegram.js';
import { startOpsServer } from './server/ops.js';

async function main() {
  const token = config.telegramToken;
  if (!token) {
    logger.fatal('TELEGRAM_BOT_TOKEN is required');
    process.exit(1);
  }

  // no store, no bot
  try {
    await initDb();
  } catch (err) {
    logger.fatal({ err }, 'database init failed');
    process.exit(1);
  }

  await bootstrapAdmins(config.bootstrap.admins, config.bootstrap.creator);

  const dispatcher = new Dispatcher(storeAnalysis);
  const bot = createTelegramBot(token, dispatcher);

  let polling = false;
  const opsServer: Server | null = config.opsPort
    ? startOpsServer(config.opsPort, { telegram: () => polling })
    : null;

  // ---- global process error traps ----
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'uncaughtException');
    void shutdown('uncaughtException', 1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandledRejection');
    void shutdown('unhandledRejection', 1);
  });
  process.on('SIGINT', () => void shutdown('SIGINT', 0));
  process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

  let closing = false;
  async function shutdown(sig: string, code: number) {
    if (closing) return;
    closing = true;
    logger.warn({ sig, inflight: dispatcher.sessions.pending() }, 'bot shutting down');
    if (polling) bot.stop(sig);
    polling = false;
    if (opsServer) {
      await new Promise<void>((res) => opsServer.close(() => res()));
    }
    await closeDb().catch((err: unknown) => logger.error({ err }, 'error closing pg pool'));
    logger.info('bye');
    process.exit(code);
  }

  logger.info(
    { env: config.env, opsPort: config.opsPort || undefined, bootstrapAdmins: config.bootstrap.admins.length },
    'bot starting',
  );
  // launch() resolves only when polling stops
  await bot.launch(() => {
    polling = true;
    logger.info('telegram polling started');
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'bot crashed');
  process.exit(1);
});
