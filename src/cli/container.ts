// Lightweight dependency injection container for CLI
// Builds the engine over the database and policy, no Discord client or background workers;
// notices the CLI queues are delivered by the running service
// Uses singleton pattern to reuse container across commands

import type { Database } from 'better-sqlite3';
import { StsIdentityExchange } from '../adapters/aws/StsIdentityExchange';
import { SupportCaseBackend } from '../adapters/aws/SupportCaseBackend';
import type { Config } from '../core/ports';
import { buildEngine, openEngineDatabase, type Engine } from '../infra/container';
import type { SqliteCaseRegistry } from '../infra/db/SqliteCaseRegistry';
import type { SqliteOutboxRepository } from '../infra/db/SqliteOutboxRepository';
import { loadStorageEnv } from '../infra/env';
import { ConfigImpl, loadPolicyConfig } from '../infra/services/Config';

// Container shape for CLI commands
export interface CliContainer {
  config: Config;
  db: Database;
  registry: SqliteCaseRegistry;
  outbox: SqliteOutboxRepository;
  engine: Engine;
  disconnect: () => Promise<void>;
}

// Cached container instance (singleton pattern)
let container: CliContainer | null = null;

// Get or create CLI container
// Opens the database on first call; later calls reuse it
export async function getCliContainer(): Promise<CliContainer> {
  if (container) {
    return container;
  }

  const env = loadStorageEnv();
  const config: Config = new ConfigImpl(loadPolicyConfig(env.POLICY_PATH));
  const db = openEngineDatabase(env.DATABASE_PATH);
  const exchange = new StsIdentityExchange();
  const engine = buildEngine({ config, db, exchange, backend: new SupportCaseBackend() });

  // disconnect closes the database and the AWS client, and resets singleton
  const disconnect = async (): Promise<void> => {
    exchange.destroy();
    db.close();
    container = null;
  };

  container = { config, db, registry: engine.registry, outbox: engine.outbox, engine, disconnect };
  return container;
}
