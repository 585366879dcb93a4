import dotenv from 'dotenv';
import { Server } from 'http';
import { loadConfig, BotConfig } from './config/env';
import { createContext } from './context';
import { createApp } from './app';
import { logger, loggers, resolveLevel } from './utils/logger';
import { ValidationError } from './middleware/errorHandler';
import { TelegramNotifier } from './services/telegramNotifier';
import { TradingScheduler } from './services/tradingScheduler';
import { CommandService } from './services/commandService';
import { HealthCheckService } from './services/healthCheckService';
import { RecoverySupervisor } from './services/recoverySupervisor';

// Load environment variables
dotenv.config();

const log = loggers.app;

function readConfig(): BotConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ValidationError) {
      log.critical('Configuration invalid, refusing to start', error);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  logger.setLevel(resolveLevel(config.logLevel));

  const notifier = new TelegramNotifier(config.telegram);
  const ctx = createContext(config, { notifier });
  await ctx.store.load();

  const scheduler = new TradingScheduler(ctx);
  const commands = new CommandService(ctx, scheduler);
  const health = new HealthCheckService({ market: ctx.market, notifier, clock: ctx.clock });
  const supervisor = new RecoverySupervisor({
    loop: scheduler,
    executor: ctx.executor,
    store: ctx.store,
    notifier,
    activityLog: ctx.activityLog,
    health,
  });
  supervisor.addTask('telegram-commands', (token) => notifier.poll((command) => commands.handle(command), token));

  const app = createApp({ ctx, queue: scheduler, probe: supervisor, health });
  const server: Server = app.listen(config.controlPort, () => {
    log.info(`Control API listening on port ${config.controlPort}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      log.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }
    shuttingDown = true;
    log.info(`Received ${signal}, starting graceful shutdown`);
    supervisor.stop(signal).catch((error: unknown) => log.error('Shutdown failed', error));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGHUP', () => shutdown('SIGHUP'));
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled rejection', reason);
  });

  await ctx.activityLog.record('Bot started', { pairs: config.tradingPairs });
  const greeting = await notifier.sendNotification(
    `🚀 Trading bot started\nPairs: ${config.tradingPairs.join(', ')}\nMode: ${ctx.store.state.currentMode.toUpperCase()}`
  );
  if (!greeting.ok) {
    log.warn('Startup notification not delivered', { error: greeting.error.message });
  }

  const outcome = await supervisor.start();

  await new Promise<void>((resolve) => server.close(() => resolve()));
  log.info('Control API closed');

  process.exit(outcome.exhausted ? 1 : 0);
}

main().catch((error: unknown) => {
  log.critical('Fatal startup error', error);
  process.exit(1);
});
