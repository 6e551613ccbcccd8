import fs from 'fs';
import path from 'path';
import type { Server } from 'http';
import type { Database } from 'better-sqlite3';
import { DiscordClient } from '../adapters/discord/DiscordClient';
import { DiscordTransport } from '../adapters/discord/DiscordTransport';
import { StsIdentityExchange } from '../adapters/aws/StsIdentityExchange';
import { SupportCaseBackend } from '../adapters/aws/SupportCaseBackend';
import { createIngestApp, startIngestServer, stopIngestServer } from '../adapters/http/ingestServer';
import { startOutboxWorker } from '../adapters/scheduler/OutboxWorker';
import { startPollWorker } from '../adapters/scheduler/PollWorker';
import { startLifecycleWorker } from '../adapters/scheduler/LifecycleWorker';
import type { WorkerHandle } from '../adapters/scheduler/periodic';
import { CredentialBroker } from '../core/application/CredentialBroker';
import { CommunicationForwarder } from '../core/application/CommunicationForwarder';
import { NotificationIngest } from '../core/application/NotificationIngest';
import { ReconciliationPoller } from '../core/application/ReconciliationPoller';
import { LifecycleScheduler } from '../core/application/LifecycleScheduler';
import { OutboundNotifier } from '../core/application/OutboundNotifier';
import type { CaseBackend, Config, IdentityExchange } from '../core/ports';
import { openDatabase } from './db/database';
import { SqliteCaseRegistry } from './db/SqliteCaseRegistry';
import { SqliteOutboxRepository } from './db/SqliteOutboxRepository';
import { loadEnv } from './env';
import { componentLogger, logger } from './logger';
import { ConfigImpl, loadPolicyConfig } from './services/Config';
import { renderTemplate } from './utils/template';

export interface Engine {
  config: Config;
  db: Database;
  registry: SqliteCaseRegistry;
  outbox: SqliteOutboxRepository;
  broker: CredentialBroker;
  ingest: NotificationIngest;
  poller: ReconciliationPoller;
  scheduler: LifecycleScheduler;
}

export interface EngineDeps {
  config: Config;
  db: Database;
  exchange: IdentityExchange;
  backend: CaseBackend;
}

// Wire the engine's components over their ports; shared by the daemon and the CLI.
// Delivery is left out: only the daemon holds a chat connection.
export function buildEngine({ config, db, exchange, backend }: EngineDeps): Engine {
  const outbox = new SqliteOutboxRepository(db);
  const registry = new SqliteCaseRegistry(db, outbox);
  const broker = new CredentialBroker(config, exchange, componentLogger('credential-broker'));
  const forwarder = new CommunicationForwarder(registry, config, componentLogger('communications'));

  return {
    config,
    db,
    registry,
    outbox,
    broker,
    ingest: new NotificationIngest(registry, broker, backend, forwarder, config, componentLogger('ingest')),
    poller: new ReconciliationPoller(registry, broker, backend, forwarder, config, componentLogger('poller')),
    scheduler: new LifecycleScheduler(registry, config, componentLogger('lifecycle')),
  };
}

export function openEngineDatabase(databasePath: string): Database {
  if (databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(process.cwd(), databasePath)), { recursive: true });
  }
  return openDatabase(databasePath);
}

export interface AppContainer {
  engine: Engine;
  ingestPort: number;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export async function buildContainer(): Promise<AppContainer> {
  const env = loadEnv();
  const config = new ConfigImpl(loadPolicyConfig(env.POLICY_PATH));
  const db = openEngineDatabase(env.DATABASE_PATH);

  const discordClient = new DiscordClient();
  const exchange = new StsIdentityExchange();
  const engine = buildEngine({ config, db, exchange, backend: new SupportCaseBackend() });
  const notifier = new OutboundNotifier(new DiscordTransport(discordClient), config, renderTemplate);

  const workers: WorkerHandle[] = [];
  let server: Server | null = null;

  const start = async (): Promise<void> => {
    logger.info({ accounts: config.accounts().length }, 'Starting application container');
    await discordClient.start(env.DISCORD_TOKEN);
    logger.info({ guilds: discordClient.guildCount }, 'Discord client ready');

    const timings = config.timings();
    const limits = config.limits();
    workers.push(
      startOutboxWorker({
        outbox: engine.outbox,
        notifier,
        policy: config,
        batchSize: limits.outboxBatchSize,
        intervalMs: timings.outboxIntervalMs,
      }),
      startPollWorker({ poller: engine.poller, intervalMs: timings.pollIntervalMs }),
      startLifecycleWorker({ scheduler: engine.scheduler, intervalMs: timings.lifecycleIntervalMs }),
    );

    server = await startIngestServer(
      createIngestApp({ ingest: engine.ingest, config, secret: env.INGEST_SECRET }),
      env.INGEST_PORT,
    );
  };

  const stop = async (): Promise<void> => {
    logger.info('Stopping application container');
    if (server) {
      await stopIngestServer(server);
    }
    await Promise.all(workers.map((worker) => worker.stop()));
    await discordClient.shutdown();
    exchange.destroy();
    db.close();
  };

  return { engine, ingestPort: env.INGEST_PORT, start, stop };
}
