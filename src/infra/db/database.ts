import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

// All timestamps are stored as epoch milliseconds.
const SCHEMA = `
  create table if not exists cases (
    account_key text not null,
    case_id text not null,
    display_id text not null,
    subject text,
    status text not null,
    status_at integer not null,
    last_communication_at integer,
    version integer not null default 1,
    primary key (account_key, case_id)
  );

  create table if not exists conversations (
    conversation_id text primary key,
    account_key text not null,
    case_id text not null,
    creator_id text not null,
    created_at integer not null,
    resolved_at integer,
    warned_at integer,
    archived integer not null default 0,
    archived_at integer,
    foreign key (account_key, case_id) references cases (account_key, case_id)
  );
  create unique index if not exists ux_conversations_live_case
    on conversations (account_key, case_id) where archived = 0;
  create index if not exists idx_conversations_creator on conversations (creator_id);
  create index if not exists idx_conversations_resolved on conversations (archived, resolved_at);

  create table if not exists transitions (
    id text primary key,
    dedup_key text not null unique,
    source text not null,
    account_key text not null,
    case_id text not null,
    previous_status text not null,
    observed_status text not null,
    outcome text not null,
    processed_at integer not null
  );
  create index if not exists idx_transitions_case on transitions (account_key, case_id, processed_at);
  create index if not exists idx_transitions_processed on transitions (processed_at);

  create table if not exists outbox (
    id text primary key,
    conversation_id text not null,
    kind text not null,
    template text not null,
    payload text not null,
    idempotency_key text not null unique,
    status text not null default 'pending',
    attempts integer not null default 0,
    next_attempt_at integer,
    last_error text,
    created_at integer not null
  );
  create index if not exists idx_outbox_due on outbox (status, next_attempt_at);
`;

export function openDatabase(filename: string): DatabaseType {
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

export const fromMillis = (value: number | null): Date | undefined => (value === null ? undefined : new Date(value));
