import { randomUUID } from 'crypto';
import type { Database } from 'better-sqlite3';
import type {
  ApplyResult,
  CaseRecord,
  CaseRegistry,
  CaseStatus,
  Conversation,
  CreateMappingInput,
  Notice,
  PageRequest,
  ProposedTransition,
  RegistryStats,
  TrackedCase,
  TransitionRecord,
  TransitionSource,
} from '../../core/ports';
import { classifyEdge } from '../../core/domain/caseStatus';
import { AlreadyExistsError } from '../../core/domain/errors';
import { transitionNotice } from '../../core/domain/notices';
import { fromMillis } from './database';
import type { SqliteOutboxRepository } from './SqliteOutboxRepository';

interface CaseRow {
  account_key: string;
  case_id: string;
  display_id: string;
  subject: string | null;
  status: CaseStatus;
  status_at: number;
  last_communication_at: number | null;
  version: number;
}

interface ConversationRow {
  conversation_id: string;
  account_key: string;
  case_id: string;
  creator_id: string;
  created_at: number;
  resolved_at: number | null;
  warned_at: number | null;
  archived: number;
  archived_at: number | null;
}

type TrackedRow = CaseRow & ConversationRow;

interface TransitionRow {
  id: string;
  dedup_key: string;
  source: TransitionSource;
  account_key: string;
  case_id: string;
  previous_status: CaseStatus;
  observed_status: CaseStatus;
  outcome: TransitionRecord['outcome'];
  processed_at: number;
}

const TRACKED_SELECT = `
  select c.account_key, c.case_id, c.display_id, c.subject, c.status, c.status_at,
         c.last_communication_at, c.version,
         v.conversation_id, v.creator_id, v.created_at, v.resolved_at, v.warned_at, v.archived, v.archived_at
  from conversations v
  join cases c on c.account_key = v.account_key and c.case_id = v.case_id
`;

const toCase = (row: CaseRow): CaseRecord => ({
  accountKey: row.account_key,
  caseId: row.case_id,
  displayId: row.display_id,
  subject: row.subject ?? undefined,
  status: row.status,
  statusAt: new Date(row.status_at),
  lastCommunicationAt: fromMillis(row.last_communication_at),
  version: row.version,
});

const toConversation = (row: ConversationRow): Conversation => ({
  conversationId: row.conversation_id,
  accountKey: row.account_key,
  caseId: row.case_id,
  creatorId: row.creator_id,
  createdAt: new Date(row.created_at),
  resolvedAt: fromMillis(row.resolved_at),
  warnedAt: fromMillis(row.warned_at),
  archived: row.archived === 1,
  archivedAt: fromMillis(row.archived_at),
});

const toTracked = (row: TrackedRow): TrackedCase => ({ kase: toCase(row), conversation: toConversation(row) });

const toTransition = (row: TransitionRow): TransitionRecord => ({
  id: row.id,
  source: row.source,
  accountKey: row.account_key,
  caseId: row.case_id,
  previousStatus: row.previous_status,
  observedStatus: row.observed_status,
  outcome: row.outcome,
  dedupKey: row.dedup_key,
  processedAt: new Date(row.processed_at),
});

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';

/**
 * SQLite-backed case registry.
 *
 * Every mutating operation runs as one `BEGIN IMMEDIATE` transaction, so the
 * dedup check, status read, edge validation and write for a case cannot
 * interleave with another writer. Case rows additionally carry a version that
 * the status update compares and swaps.
 */
export class SqliteCaseRegistry implements CaseRegistry {
  constructor(
    private readonly db: Database,
    private readonly outbox: SqliteOutboxRepository,
  ) {}

  async lookupByCase(accountKey: string, caseId: string): Promise<Conversation | null> {
    const row = this.db
      .prepare<[string, string], ConversationRow>(
        'select * from conversations where account_key = ? and case_id = ? and archived = 0',
      )
      .get(accountKey, caseId);
    return row ? toConversation(row) : null;
  }

  async lookupByConversation(conversationId: string): Promise<TrackedCase | null> {
    const row = this.db
      .prepare<[string], TrackedRow>(`${TRACKED_SELECT} where v.conversation_id = ?`)
      .get(conversationId);
    return row ? toTracked(row) : null;
  }

  async lookupByParticipant(creatorId: string): Promise<Conversation[]> {
    return this.db
      .prepare<[string], ConversationRow>('select * from conversations where creator_id = ? order by created_at desc')
      .all(creatorId)
      .map(toConversation);
  }

  async createMapping(input: CreateMappingInput, now: Date = new Date()): Promise<Conversation> {
    const create = this.db.transaction((at: number): Conversation => {
      const live = this.db
        .prepare<[string, string], { conversation_id: string }>(
          'select conversation_id from conversations where account_key = ? and case_id = ? and archived = 0',
        )
        .get(input.accountKey, input.caseId);
      if (live) {
        throw new AlreadyExistsError(input.accountKey, input.caseId, live.conversation_id);
      }

      const status: CaseStatus = input.status ?? 'OPEN';
      // A case whose previous conversation was archived starts over with the
      // status it has now.
      this.db
        .prepare<[string, string, string, string | null, CaseStatus, number]>(
          `insert into cases (account_key, case_id, display_id, subject, status, status_at, version)
           values (?, ?, ?, ?, ?, ?, 1)
           on conflict (account_key, case_id) do update set
             display_id = excluded.display_id,
             subject = coalesce(excluded.subject, cases.subject),
             status = excluded.status,
             status_at = excluded.status_at,
             last_communication_at = null,
             version = cases.version + 1`,
        )
        .run(
          input.accountKey,
          input.caseId,
          input.displayId ?? input.caseId,
          input.subject ?? null,
          status,
          at,
        );

      // Linking an already resolved case starts its grace period now
      const resolvedAt = status === 'RESOLVED' ? at : null;
      this.db
        .prepare<[string, string, string, string, number, number | null]>(
          `insert into conversations (conversation_id, account_key, case_id, creator_id, created_at, resolved_at, archived)
           values (?, ?, ?, ?, ?, ?, 0)`,
        )
        .run(input.conversationId, input.accountKey, input.caseId, input.creatorId, at, resolvedAt);

      return {
        conversationId: input.conversationId,
        accountKey: input.accountKey,
        caseId: input.caseId,
        creatorId: input.creatorId,
        createdAt: new Date(at),
        resolvedAt: fromMillis(resolvedAt),
        archived: false,
      };
    });

    try {
      return create.immediate(now.getTime());
    } catch (error) {
      // Another writer linked the case between our check and insert
      if (isUniqueViolation(error)) {
        const existing = await this.lookupByCase(input.accountKey, input.caseId);
        throw new AlreadyExistsError(input.accountKey, input.caseId, existing?.conversationId ?? input.conversationId);
      }
      throw error;
    }
  }

  async applyTransition(proposed: ProposedTransition, now: Date = new Date()): Promise<ApplyResult> {
    const apply = this.db.transaction((p: ProposedTransition, at: number): ApplyResult => {
      const seen = this.db
        .prepare<[string], { id: string }>('select id from transitions where dedup_key = ?')
        .get(p.dedupKey);
      if (seen) {
        return { outcome: 'duplicate_ignored', dedupKey: p.dedupKey };
      }

      const row = this.db
        .prepare<[string, string], TrackedRow>(
          `${TRACKED_SELECT} where v.account_key = ? and v.case_id = ? and v.archived = 0`,
        )
        .get(p.accountKey, p.caseId);
      if (!row) {
        return { outcome: 'not_found' };
      }

      const { kase, conversation } = toTracked(row);
      const verdict = classifyEdge(kase.status, p.observedStatus);
      const transition: TransitionRecord = {
        id: randomUUID(),
        source: p.source,
        accountKey: p.accountKey,
        caseId: p.caseId,
        previousStatus: kase.status,
        observedStatus: p.observedStatus,
        outcome: verdict === 'illegal' ? 'rejected_invalid_edge' : 'applied',
        dedupKey: p.dedupKey,
        processedAt: new Date(at),
      };
      this.insertTransition(transition);

      if (verdict === 'illegal') {
        return { outcome: 'rejected_invalid_edge', transition };
      }
      if (verdict === 'same') {
        return { outcome: 'applied', changed: false, transition, conversation, kase };
      }

      const swapped = this.db
        .prepare<[CaseStatus, number, string, string, number]>(
          `update cases set status = ?, status_at = ?, version = version + 1
           where account_key = ? and case_id = ? and version = ?`,
        )
        .run(p.observedStatus, at, p.accountKey, p.caseId, kase.version);
      if (swapped.changes !== 1) {
        throw new Error(`Case ${p.caseId} on account "${p.accountKey}" changed during transition`);
      }

      let resolvedAt = conversation.resolvedAt;
      let warnedAt = conversation.warnedAt;
      if (p.observedStatus === 'RESOLVED' && !resolvedAt) {
        resolvedAt = new Date(at);
        warnedAt = undefined;
      } else if (p.observedStatus === 'REOPENED') {
        resolvedAt = undefined;
        warnedAt = undefined;
      }
      this.db
        .prepare<[number | null, number | null, string]>(
          'update conversations set resolved_at = ?, warned_at = ? where conversation_id = ?',
        )
        .run(resolvedAt?.getTime() ?? null, warnedAt?.getTime() ?? null, conversation.conversationId);

      const updatedCase: CaseRecord = {
        ...kase,
        status: p.observedStatus,
        statusAt: new Date(at),
        version: kase.version + 1,
      };
      const updatedConversation: Conversation = { ...conversation, resolvedAt, warnedAt };
      this.outbox.insert(transitionNotice(transition, updatedConversation, updatedCase), new Date(at));

      return { outcome: 'applied', changed: true, transition, conversation: updatedConversation, kase: updatedCase };
    });

    return apply.immediate(proposed, now.getTime());
  }

  // Keyset pagination over conversation ids keeps large registries out of memory
  async listLive(accountKey: string, page: PageRequest): Promise<TrackedCase[]> {
    return this.db
      .prepare<[string, string, number], TrackedRow>(
        `${TRACKED_SELECT}
         where v.account_key = ? and v.archived = 0 and v.conversation_id > ?
         order by v.conversation_id asc
         limit ?`,
      )
      .all(accountKey, page.afterConversationId ?? '', page.limit)
      .map(toTracked);
  }

  async listResolvedPendingArchive(page: PageRequest): Promise<TrackedCase[]> {
    return this.db
      .prepare<[string, number], TrackedRow>(
        `${TRACKED_SELECT}
         where v.archived = 0 and v.resolved_at is not null and v.conversation_id > ?
         order by v.conversation_id asc
         limit ?`,
      )
      .all(page.afterConversationId ?? '', page.limit)
      .map(toTracked);
  }

  async markWarned(conversationId: string, notice: Notice, now: Date = new Date()): Promise<boolean> {
    const warn = this.db.transaction((at: number): boolean => {
      const updated = this.db
        .prepare<[number, string]>(
          `update conversations set warned_at = ?
           where conversation_id = ? and archived = 0 and resolved_at is not null and warned_at is null`,
        )
        .run(at, conversationId);
      if (updated.changes !== 1) {
        return false;
      }
      this.outbox.insert(notice, new Date(at));
      return true;
    });
    return warn.immediate(now.getTime());
  }

  async archiveIfStillResolved(
    conversationId: string,
    resolvedBefore: Date,
    notice: Notice,
    now: Date = new Date(),
  ): Promise<boolean> {
    const archive = this.db.transaction((cutoff: number, at: number): boolean => {
      // The status check happens inside the write: a reopen that landed after
      // the scan keeps the conversation live.
      const updated = this.db
        .prepare<[number, string, number]>(
          `update conversations set archived = 1, archived_at = ?
           where conversation_id = ?
             and archived = 0
             and resolved_at is not null
             and resolved_at <= ?
             and exists (
               select 1 from cases c
               where c.account_key = conversations.account_key
                 and c.case_id = conversations.case_id
                 and c.status = 'RESOLVED'
             )`,
        )
        .run(at, conversationId, cutoff);
      if (updated.changes !== 1) {
        return false;
      }
      this.outbox.insert(notice, new Date(at));
      return true;
    });
    return archive.immediate(resolvedBefore.getTime(), now.getTime());
  }

  async recordCommunications(
    accountKey: string,
    caseId: string,
    notices: Notice[],
    watermark: Date,
  ): Promise<number> {
    const record = this.db.transaction((mark: number): number => {
      this.db
        .prepare<[number, string, string, number]>(
          `update cases set last_communication_at = ?
           where account_key = ? and case_id = ? and coalesce(last_communication_at, 0) < ?`,
        )
        .run(mark, accountKey, caseId, mark);

      let enqueued = 0;
      const at = new Date();
      for (const notice of notices) {
        if (this.outbox.insert(notice, at)) {
          enqueued += 1;
        }
      }
      return enqueued;
    });
    return record.immediate(watermark.getTime());
  }

  async listTransitions(accountKey: string, caseId: string): Promise<TransitionRecord[]> {
    return this.db
      .prepare<[string, string], TransitionRow>(
        'select * from transitions where account_key = ? and case_id = ? order by processed_at asc',
      )
      .all(accountKey, caseId)
      .map(toTransition);
  }

  async pruneTransitions(olderThan: Date): Promise<number> {
    return this.db.prepare<[number]>('delete from transitions where processed_at < ?').run(olderThan.getTime())
      .changes;
  }

  async stats(): Promise<RegistryStats> {
    const cases: Record<string, number> = {};
    for (const row of this.db
      .prepare<[], { status: string; count: number }>('select status, count(*) as count from cases group by status')
      .all()) {
      cases[row.status] = row.count;
    }

    const outbox: Record<string, number> = {};
    for (const row of this.db
      .prepare<[], { status: string; count: number }>('select status, count(*) as count from outbox group by status')
      .all()) {
      outbox[row.status] = row.count;
    }

    const conversations = this.db
      .prepare<[], { live: number | null; archived: number | null }>(
        'select sum(case when archived = 0 then 1 else 0 end) as live, sum(archived) as archived from conversations',
      )
      .get();

    return {
      cases,
      liveConversations: conversations?.live ?? 0,
      archivedConversations: conversations?.archived ?? 0,
      outbox,
    };
  }

  private insertTransition(transition: TransitionRecord): void {
    this.db
      .prepare<[string, string, TransitionSource, string, string, CaseStatus, CaseStatus, string, number]>(
        `insert into transitions
          (id, dedup_key, source, account_key, case_id, previous_status, observed_status, outcome, processed_at)
         values (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        transition.id,
        transition.dedupKey,
        transition.source,
        transition.accountKey,
        transition.caseId,
        transition.previousStatus,
        transition.observedStatus,
        transition.outcome,
        transition.processedAt.getTime(),
      );
  }
}
