import { randomUUID } from 'crypto';
import type { Database } from 'better-sqlite3';
import type { Notice, NoticeKind, OutboxJob, OutboxRepository } from '../../core/ports';

// How long a taken job stays invisible to other workers before it is due again
const LEASE_MS = 60 * 1000;

interface OutboxRow {
  id: string;
  conversation_id: string;
  kind: NoticeKind;
  template: string;
  payload: string;
  idempotency_key: string;
  status: string;
  attempts: number;
  next_attempt_at: number | null;
  last_error: string | null;
  created_at: number;
}

export interface OutboxListing {
  id: string;
  conversationId: string;
  kind: NoticeKind;
  identity: string;
  status: string;
  attempts: number;
  nextAttemptAt?: Date;
  lastError?: string;
}

const parsePayload = (raw: string): Record<string, string> => {
  const parsed: unknown = JSON.parse(raw);
  const data: Record<string, string> = {};
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        data[key] = value;
      }
    }
  }
  return data;
};

// Transform outbox row to port OutboxJob
const toJob = (row: OutboxRow): OutboxJob => ({
  id: row.id,
  conversationId: row.conversation_id,
  kind: row.kind,
  template: row.template,
  data: parsePayload(row.payload),
  identity: row.idempotency_key,
  attempts: row.attempts,
});

// SQLite repository implementing OutboxRepository port interface
// Implements reliable message delivery with exponential backoff retries
export class SqliteOutboxRepository implements OutboxRepository {
  constructor(private readonly db: Database) {}

  async enqueue(notice: Notice): Promise<boolean> {
    return this.insert(notice, new Date());
  }

  // Synchronous insert so the registry can enqueue inside its own transaction.
  // The idempotency key is unique: a second insert for the same notice is a no-op.
  insert(notice: Notice, now: Date): boolean {
    const result = this.db
      .prepare<[string, string, string, string, string, string, number, number]>(
        `insert or ignore into outbox
          (id, conversation_id, kind, template, payload, idempotency_key, status, attempts, next_attempt_at, created_at)
         values (?, ?, ?, ?, ?, ?, 'pending', 0, ?, ?)`,
      )
      .run(
        randomUUID(),
        notice.conversationId,
        notice.kind,
        notice.template,
        JSON.stringify(notice.data),
        notice.identity,
        now.getTime(),
        now.getTime(),
      );
    return result.changes === 1;
  }

  // Fetch pending jobs whose retry time has arrived and push their next attempt
  // out by the lease so a concurrent worker does not pick them up too
  async takeDue(batchSize: number, now: Date = new Date()): Promise<OutboxJob[]> {
    const take = this.db.transaction((limit: number, at: number): OutboxRow[] => {
      const rows = this.db
        .prepare<[number, number], OutboxRow>(
          `select * from outbox
           where status = 'pending' and (next_attempt_at is null or next_attempt_at <= ?)
           order by next_attempt_at asc, created_at asc
           limit ?`,
        )
        .all(at, limit);

      const lease = this.db.prepare<[number, string]>('update outbox set next_attempt_at = ? where id = ?');
      for (const row of rows) {
        lease.run(at + LEASE_MS, row.id);
      }
      return rows;
    });

    return take.immediate(batchSize, now.getTime()).map(toJob);
  }

  async markSent(jobId: string): Promise<void> {
    this.db
      .prepare<[string]>(`update outbox set status = 'sent', last_error = null, next_attempt_at = null where id = ?`)
      .run(jobId);
  }

  // Increments attempt counter and schedules next retry
  async markFailed(jobId: string, error: string, retryAt: Date): Promise<void> {
    this.db
      .prepare<[string, number, string]>(
        `update outbox set status = 'pending', attempts = attempts + 1, last_error = ?, next_attempt_at = ? where id = ?`,
      )
      .run(error, retryAt.getTime(), jobId);
  }

  async markPermanentlyFailed(jobId: string, error: string): Promise<void> {
    this.db
      .prepare<[string, string]>(
        `update outbox set status = 'failed', attempts = attempts + 1, last_error = ?, next_attempt_at = null where id = ?`,
      )
      .run(error, jobId);
  }

  // Put failed jobs back in the queue with a fresh attempt budget
  async retryFailed(jobId?: string): Promise<number> {
    const now = Date.now();
    if (jobId) {
      return this.db
        .prepare<[number, string]>(
          `update outbox set status = 'pending', attempts = 0, next_attempt_at = ? where id = ? and status = 'failed'`,
        )
        .run(now, jobId).changes;
    }
    return this.db
      .prepare<[number]>(`update outbox set status = 'pending', attempts = 0, next_attempt_at = ? where status = 'failed'`)
      .run(now).changes;
  }

  async purgeFailed(): Promise<number> {
    return this.db.prepare(`delete from outbox where status = 'failed'`).run().changes;
  }

  async list(options: { status?: string; limit: number }): Promise<OutboxListing[]> {
    const rows = options.status
      ? this.db
          .prepare<[string, number], OutboxRow>(
            'select * from outbox where status = ? order by created_at desc limit ?',
          )
          .all(options.status, options.limit)
      : this.db
          .prepare<[number], OutboxRow>('select * from outbox order by created_at desc limit ?')
          .all(options.limit);

    return rows.map((row) => ({
      id: row.id,
      conversationId: row.conversation_id,
      kind: row.kind,
      identity: row.idempotency_key,
      status: row.status,
      attempts: row.attempts,
      nextAttemptAt: row.next_attempt_at === null ? undefined : new Date(row.next_attempt_at),
      lastError: row.last_error ?? undefined,
    }));
  }
}
