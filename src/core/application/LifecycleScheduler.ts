import type { CaseRegistry, Config, Logger, TrackedCase } from '../ports';
import { archiveNotice, warningNotice } from '../domain/notices';

export interface SweepSummary {
  scanned: number;
  warned: number;
  archived: number;
  skipped: number;
}

// Conversations are read in pages of this size while sweeping
const SWEEP_PAGE_SIZE = 200;

/**
 * Archives conversations whose case has stayed resolved for the grace period.
 *
 * Per conversation: ACTIVE -> RESOLVED_PENDING_ARCHIVE (resolvedAt set) ->
 * ARCHIVED. `resolvedAt` is re-read every cycle and the archive write itself
 * re-checks that the case is still RESOLVED, so a reopen at any point before
 * the write keeps the conversation alive.
 */
export class LifecycleScheduler {
  constructor(
    private readonly registry: CaseRegistry,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async runCycle(now: Date = new Date()): Promise<SweepSummary> {
    const summary: SweepSummary = { scanned: 0, warned: 0, archived: 0, skipped: 0 };
    let after: string | undefined;

    for (;;) {
      const page = await this.registry.listResolvedPendingArchive({ afterConversationId: after, limit: SWEEP_PAGE_SIZE });
      for (const tracked of page) {
        summary.scanned += 1;
        await this.sweep(tracked, now, summary);
      }
      if (page.length < SWEEP_PAGE_SIZE) {
        break;
      }
      after = page[page.length - 1].conversation.conversationId;
    }

    if (summary.warned > 0 || summary.archived > 0) {
      this.logger.info({ ...summary }, 'Lifecycle sweep finished');
    }
    return summary;
  }

  private async sweep(tracked: TrackedCase, now: Date, summary: SweepSummary): Promise<void> {
    const { kase, conversation } = tracked;
    if (!conversation.resolvedAt) {
      return;
    }

    const { gracePeriodMs, warningLeadTimeMs } = this.config.timings();
    const resolvedAtMs = conversation.resolvedAt.getTime();
    const elapsed = now.getTime() - resolvedAtMs;
    const context = { conversationId: conversation.conversationId, caseId: kase.caseId, accountKey: kase.accountKey };

    // A conversation that missed its warning window still gets the warning,
    // immediately ahead of the archive.
    if (elapsed >= gracePeriodMs - warningLeadTimeMs && !conversation.warnedAt) {
      const archiveAt = new Date(resolvedAtMs + gracePeriodMs);
      const warned = await this.registry.markWarned(
        conversation.conversationId,
        warningNotice(conversation, kase, archiveAt),
        now,
      );
      if (warned) {
        summary.warned += 1;
        this.logger.info({ ...context, archiveAt: archiveAt.toISOString() }, 'Archive warning issued');
      }
    }

    if (elapsed >= gracePeriodMs) {
      const archived = await this.registry.archiveIfStillResolved(
        conversation.conversationId,
        new Date(now.getTime() - gracePeriodMs),
        archiveNotice(conversation, kase),
        now,
      );
      if (archived) {
        summary.archived += 1;
        this.logger.info({ ...context, resolvedAt: conversation.resolvedAt.toISOString() }, 'Conversation archived');
      } else {
        summary.skipped += 1;
        this.logger.info(context, 'Archive skipped: case no longer resolved');
      }
    }
  }
}
