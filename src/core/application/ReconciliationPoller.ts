import type {
  CaseBackend,
  CaseRegistry,
  CaseSnapshot,
  Config,
  CredentialLease,
  CredentialProvider,
  Logger,
  TrackedCase,
} from '../ports';
import { dedupKeyOf } from '../domain/dedup';
import { BackendError, describeError } from '../domain/errors';
import { mapWithConcurrency, withTimeout } from '../utils/async';
import type { CommunicationForwarder } from './CommunicationForwarder';
import { logApplyResult } from './transitionLog';

export interface AccountPollReport {
  accountKey: string;
  ok: boolean;
  checked: number;
  applied: number;
  duplicates: number;
  rejected: number;
  notFound: number;
  communications: number;
  failedCases: number;
  error?: string;
}

export interface PollCycleSummary {
  startedAt: Date;
  finishedAt: Date;
  accounts: AccountPollReport[];
  failedAccounts: number;
  applied: number;
}

const emptyReport = (accountKey: string): AccountPollReport => ({
  accountKey,
  ok: true,
  checked: 0,
  applied: 0,
  duplicates: 0,
  rejected: 0,
  notFound: 0,
  communications: 0,
  failedCases: 0,
});

/**
 * Periodic reconciliation against the backend's authoritative case status.
 *
 * The backend pushes no event for a plain status change, so this cycle is the
 * only path for most transitions. Accounts are polled concurrently up to the
 * configured fan-out; a failing account is reported and left for the next
 * cycle without touching the others.
 */
export class ReconciliationPoller {
  constructor(
    private readonly registry: CaseRegistry,
    private readonly credentials: CredentialProvider,
    private readonly backend: CaseBackend,
    private readonly forwarder: CommunicationForwarder,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async runCycle(now: Date = new Date()): Promise<PollCycleSummary> {
    const startedAt = new Date();
    const accounts = this.config.accounts();
    const { pollFanOut } = this.config.limits();

    const reports = await mapWithConcurrency(accounts, pollFanOut, async (account) => {
      const report = emptyReport(account.key);
      try {
        await this.pollAccount(account.key, report, now);
      } catch (err) {
        report.ok = false;
        report.error = describeError(err);
        if (err instanceof BackendError && err.unauthorized) {
          this.credentials.invalidate(account.key);
        }
        this.logger.error({ accountKey: account.key, err: report.error }, 'Account poll failed');
      }
      return report;
    });

    const pruned = await this.registry.pruneTransitions(
      new Date(now.getTime() - this.config.timings().dedupRetentionMs),
    );

    const summary: PollCycleSummary = {
      startedAt,
      finishedAt: new Date(),
      accounts: reports,
      failedAccounts: reports.filter((report) => !report.ok).length,
      applied: reports.reduce((sum, report) => sum + report.applied, 0),
    };
    this.logger.info(
      {
        accounts: reports.length,
        failedAccounts: summary.failedAccounts,
        applied: summary.applied,
        prunedTransitions: pruned,
        durationMs: summary.finishedAt.getTime() - startedAt.getTime(),
      },
      'Reconciliation cycle finished',
    );
    return summary;
  }

  private async pollAccount(accountKey: string, report: AccountPollReport, now: Date): Promise<void> {
    const { pollPageSize } = this.config.limits();
    let lease: CredentialLease | null = null;
    let after: string | undefined;

    for (;;) {
      const page = await this.registry.listLive(accountKey, { afterConversationId: after, limit: pollPageSize });
      if (page.length === 0) {
        return;
      }
      // No credential is needed for an account without live conversations
      lease ??= await this.credentials.getCredential(accountKey);

      for (const tracked of page) {
        try {
          await this.reconcileCase(lease, tracked, report, now);
        } catch (err) {
          // A refused credential fails every case alike; give up on the account
          if (err instanceof BackendError && err.unauthorized) {
            throw err;
          }
          report.failedCases += 1;
          report.error = describeError(err);
          this.logger.warn(
            { accountKey, caseId: tracked.kase.caseId, err: report.error },
            'Case reconciliation failed, will retry next cycle',
          );
        }
      }

      if (page.length < pollPageSize) {
        return;
      }
      after = page[page.length - 1].conversation.conversationId;
    }
  }

  private async reconcileCase(
    lease: CredentialLease,
    tracked: TrackedCase,
    report: AccountPollReport,
    now: Date,
  ): Promise<void> {
    const { kase } = tracked;
    const { callTimeoutMs, dedupWindowMs } = this.config.timings();

    const snapshot: CaseSnapshot | null = await withTimeout(`describe case ${kase.caseId}`, callTimeoutMs, (signal) =>
      this.backend.describeCase(lease, kase.caseId, signal),
    );
    report.checked += 1;

    if (!snapshot) {
      this.logger.warn({ accountKey: kase.accountKey, caseId: kase.caseId }, 'Backend has no record of case');
      return;
    }

    report.communications += await this.forwarder.forward(tracked, snapshot.communications);

    if (snapshot.status === kase.status) {
      return;
    }

    const result = await this.registry.applyTransition(
      {
        accountKey: kase.accountKey,
        caseId: kase.caseId,
        observedStatus: snapshot.status,
        source: 'POLL',
        dedupKey: dedupKeyOf({
          accountKey: kase.accountKey,
          caseId: kase.caseId,
          status: snapshot.status,
          observedAt: now,
          windowMs: dedupWindowMs,
        }),
      },
      now,
    );
    logApplyResult(this.logger, result, {
      accountKey: kase.accountKey,
      caseId: kase.caseId,
      observedStatus: snapshot.status,
      rawStatus: snapshot.rawStatus,
      source: 'POLL',
    });

    switch (result.outcome) {
      case 'applied':
        report.applied += result.changed ? 1 : 0;
        break;
      case 'duplicate_ignored':
        report.duplicates += 1;
        break;
      case 'rejected_invalid_edge':
        report.rejected += 1;
        break;
      case 'not_found':
        report.notFound += 1;
        break;
    }
  }
}
