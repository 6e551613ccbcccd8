/**
 * Consolidated port interfaces for the case synchronization engine.
 * Organized into logical groupings to reduce complexity.
 */

// ==================== Domain Types ====================

export type CaseStatus = 'OPEN' | 'PENDING' | 'RESOLVED' | 'REOPENED';

export type TransitionSource = 'PUSH' | 'POLL';

export interface Account {
  key: string;
  roleArn: string;
  displayName: string;
}

export interface CaseRecord {
  accountKey: string;
  caseId: string;
  displayId: string;
  subject?: string;
  status: CaseStatus;
  statusAt: Date;
  lastCommunicationAt?: Date;
  version: number;
}

export interface Conversation {
  conversationId: string;
  accountKey: string;
  caseId: string;
  creatorId: string;
  createdAt: Date;
  resolvedAt?: Date;
  warnedAt?: Date;
  archived: boolean;
  archivedAt?: Date;
}

export interface TrackedCase {
  kase: CaseRecord;
  conversation: Conversation;
}

export interface TransitionRecord {
  id: string;
  source: TransitionSource;
  accountKey: string;
  caseId: string;
  previousStatus: CaseStatus;
  observedStatus: CaseStatus;
  outcome: 'applied' | 'rejected_invalid_edge';
  dedupKey: string;
  processedAt: Date;
}

// ==================== Configuration ====================

export interface TimingConfig {
  gracePeriodMs: number;
  warningLeadTimeMs: number;
  pollIntervalMs: number;
  lifecycleIntervalMs: number;
  outboxIntervalMs: number;
  dedupWindowMs: number;
  dedupRetentionMs: number;
  renewalSafetyMarginMs: number;
  renewalSafetyFraction: number;
  callTimeoutMs: number;
}

export interface LimitsConfig {
  maxNotificationRetries: number;
  notificationBackoffSeconds: number[];
  pollFanOut: number;
  pollPageSize: number;
  outboxBatchSize: number;
  communicationMaxLength: number;
}

export interface MessageTemplates {
  transition: Record<string, string>;
  lifecycle: Record<string, string>;
  communication: string;
}

/**
 * Synchronous configuration service.
 * No async needed - config is loaded at startup and doesn't change.
 */
export interface Config {
  accounts(): Account[];
  account(key: string): Account | undefined;
  timings(): TimingConfig;
  limits(): LimitsConfig;
  messaging(): MessageTemplates;
}

// ==================== Remote Ticketing Backend ====================

export interface Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
}

export interface CredentialLease {
  accountKey: string;
  credentials: Credentials;
  issuedAt: Date;
  expiresAt: Date;
}

export interface IdentityExchange {
  exchange(account: Account, signal: AbortSignal): Promise<{ credentials: Credentials; expiresAt: Date }>;
}

export interface CaseCommunication {
  body: string;
  submittedBy: string;
  createdAt: Date;
}

export interface CaseSnapshot {
  caseId: string;
  displayId: string;
  status: CaseStatus;
  rawStatus: string;
  subject?: string;
  communications: CaseCommunication[];
}

export interface CaseBackend {
  describeCase(lease: CredentialLease, caseId: string, signal: AbortSignal): Promise<CaseSnapshot | null>;
}

export interface CredentialProvider {
  getCredential(accountKey: string): Promise<CredentialLease>;
  invalidate(accountKey: string): void;
}

// ==================== Chat Transport ====================

export interface ChatDispatch {
  conversationId: string;
  identity: string;
  payload: string;
}

/**
 * At-least-once outbound channel. Implementations tag each message with the
 * identity so a repeated dispatch renders the same message once.
 */
export interface ChatTransport {
  dispatch(message: ChatDispatch, signal: AbortSignal): Promise<void>;
  archive(conversationId: string, identity: string, signal: AbortSignal): Promise<void>;
}

// ==================== Notices & Outbox ====================

export type NoticeKind = 'transition' | 'warning' | 'archive' | 'communication';

export interface Notice {
  conversationId: string;
  kind: NoticeKind;
  template: string;
  data: Record<string, string>;
  identity: string;
}

export interface OutboxJob extends Notice {
  id: string;
  attempts: number;
}

export interface OutboxRepository {
  enqueue(notice: Notice): Promise<boolean>;
  takeDue(batchSize: number, now?: Date): Promise<OutboxJob[]>;
  markSent(jobId: string): Promise<void>;
  markFailed(jobId: string, error: string, retryAt: Date): Promise<void>;
  markPermanentlyFailed(jobId: string, error: string): Promise<void>;
  retryFailed(jobId?: string): Promise<number>;
  purgeFailed(): Promise<number>;
}

// ==================== Case Registry ====================

export interface CreateMappingInput {
  accountKey: string;
  caseId: string;
  conversationId: string;
  creatorId: string;
  displayId?: string;
  subject?: string;
  status?: CaseStatus;
}

export interface ProposedTransition {
  accountKey: string;
  caseId: string;
  observedStatus: CaseStatus;
  source: TransitionSource;
  dedupKey: string;
}

export type ApplyResult =
  | {
      outcome: 'applied';
      changed: boolean;
      transition: TransitionRecord;
      conversation: Conversation;
      kase: CaseRecord;
    }
  | { outcome: 'duplicate_ignored'; dedupKey: string }
  | { outcome: 'rejected_invalid_edge'; transition: TransitionRecord }
  | { outcome: 'not_found' };

export interface PageRequest {
  afterConversationId?: string;
  limit: number;
}

export interface RegistryStats {
  cases: Record<string, number>;
  liveConversations: number;
  archivedConversations: number;
  outbox: Record<string, number>;
}

export interface CaseRegistry {
  lookupByCase(accountKey: string, caseId: string): Promise<Conversation | null>;
  lookupByConversation(conversationId: string): Promise<TrackedCase | null>;
  lookupByParticipant(creatorId: string): Promise<Conversation[]>;
  createMapping(input: CreateMappingInput, now?: Date): Promise<Conversation>;
  applyTransition(proposed: ProposedTransition, now?: Date): Promise<ApplyResult>;
  listLive(accountKey: string, page: PageRequest): Promise<TrackedCase[]>;
  listResolvedPendingArchive(page: PageRequest): Promise<TrackedCase[]>;
  markWarned(conversationId: string, notice: Notice, now?: Date): Promise<boolean>;
  archiveIfStillResolved(
    conversationId: string,
    resolvedBefore: Date,
    notice: Notice,
    now?: Date,
  ): Promise<boolean>;
  recordCommunications(accountKey: string, caseId: string, notices: Notice[], watermark: Date): Promise<number>;
  listTransitions(accountKey: string, caseId: string): Promise<TransitionRecord[]>;
  pruneTransitions(olderThan: Date): Promise<number>;
  stats(): Promise<RegistryStats>;
}

// ==================== Logging ====================

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}
