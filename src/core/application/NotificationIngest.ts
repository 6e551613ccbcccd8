import type {
  ApplyResult,
  CaseBackend,
  CaseRegistry,
  CaseSnapshot,
  CaseStatus,
  Config,
  CredentialProvider,
  Logger,
} from '../ports';
import { dedupKeyOf } from '../domain/dedup';
import { BackendError } from '../domain/errors';
import { withTimeout } from '../utils/async';
import type { CommunicationForwarder } from './CommunicationForwarder';
import { logApplyResult } from './transitionLog';

export type CaseEventKind = 'case_created' | 'communication_added' | 'case_resolved' | 'case_reopened';

export interface CaseEvent {
  accountKey: string;
  caseId: string;
  kind: CaseEventKind;
  eventTime: Date;
  eventId?: string;
}

export type IngestResult = ApplyResult | { outcome: 'informational' };

const FIXED_STATUS: Partial<Record<CaseEventKind, CaseStatus>> = {
  case_resolved: 'RESOLVED',
  case_reopened: 'REOPENED',
};

/**
 * Turns push-delivered case events into proposed transitions.
 *
 * Events are applied as they come: no buffering and no reordering. Late or
 * repeated deliveries are absorbed by the registry's dedup keys and legal-edge
 * table.
 */
export class NotificationIngest {
  constructor(
    private readonly registry: CaseRegistry,
    private readonly credentials: CredentialProvider,
    private readonly backend: CaseBackend,
    private readonly forwarder: CommunicationForwarder,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async handle(event: CaseEvent, now: Date = new Date()): Promise<IngestResult> {
    const context = { accountKey: event.accountKey, caseId: event.caseId, kind: event.kind, eventId: event.eventId };

    // Creation already happened on the chat side
    if (event.kind === 'case_created') {
      this.logger.debug(context, 'Case created event is informational');
      return { outcome: 'informational' };
    }

    const observedStatus = FIXED_STATUS[event.kind] ?? (await this.fetchCommunicationStatus(event));
    if (!observedStatus) {
      return { outcome: 'not_found' };
    }

    const dedupKey = dedupKeyOf({
      accountKey: event.accountKey,
      caseId: event.caseId,
      status: observedStatus,
      observedAt: event.eventTime,
      windowMs: this.config.timings().dedupWindowMs,
    });

    const result = await this.registry.applyTransition(
      { accountKey: event.accountKey, caseId: event.caseId, observedStatus, source: 'PUSH', dedupKey },
      now,
    );
    logApplyResult(this.logger, result, { ...context, observedStatus });
    return result;
  }

  // A new communication says nothing about the status by itself, so read the
  // authoritative one and forward the new messages while the case is at hand.
  private async fetchCommunicationStatus(event: CaseEvent): Promise<CaseStatus | null> {
    const conversation = await this.registry.lookupByCase(event.accountKey, event.caseId);
    const tracked = conversation ? await this.registry.lookupByConversation(conversation.conversationId) : null;
    if (!tracked) {
      this.logger.debug({ accountKey: event.accountKey, caseId: event.caseId }, 'No live conversation for case');
      return null;
    }

    const lease = await this.credentials.getCredential(event.accountKey);
    const { callTimeoutMs } = this.config.timings();
    let snapshot: CaseSnapshot | null;
    try {
      snapshot = await withTimeout(`describe case ${event.caseId}`, callTimeoutMs, (signal) =>
        this.backend.describeCase(lease, event.caseId, signal),
      );
    } catch (err) {
      if (err instanceof BackendError && err.unauthorized) {
        this.credentials.invalidate(event.accountKey);
      }
      throw err;
    }

    if (!snapshot) {
      this.logger.warn({ accountKey: event.accountKey, caseId: event.caseId }, 'Backend has no record of case');
      return null;
    }

    await this.forwarder.forward(tracked, snapshot.communications);
    return snapshot.status;
  }
}
