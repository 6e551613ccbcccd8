import type { AppContainer } from './infra/container';
import { buildContainer } from './infra/container';
import { logger } from './infra/logger';

let app: AppContainer | null = null;

async function main() {
  app = await buildContainer();
  const { config, registry } = app.engine;
  const timings = config.timings();

  logger.info(
    {
      accounts: config.accounts().map((account) => account.key),
      ingestPort: app.ingestPort,
      pollIntervalMs: timings.pollIntervalMs,
      gracePeriodMs: timings.gracePeriodMs,
    },
    'Starting casebridge',
  );

  const stats = await registry.stats();
  await app.start();
  logger.info(
    { liveConversations: stats.liveConversations, queuedNotices: stats.outbox.pending ?? 0 },
    'casebridge is syncing cases',
  );

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    try {
      // Undelivered notices stay queued and go out on the next start
      const { outbox } = await registry.stats();
      await app?.stop();
      logger.info({ queuedNotices: outbox.pending ?? 0 }, 'casebridge stopped');
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start casebridge');
  if (app) {
    app
      .stop()
      .catch((stopErr) => logger.error({ err: stopErr }, 'Failed to stop app container after crash'))
      .finally(() => process.exit(1));
    return;
  }
  process.exit(1);
});
