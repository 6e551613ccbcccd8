import type { CaseCommunication, CaseRegistry, Config, Logger, TrackedCase } from '../ports';
import { communicationNotice, isChatOriginated } from '../domain/notices';

// Forwards case communications newer than the case's watermark into its
// conversation, oldest first.
export class CommunicationForwarder {
  constructor(
    private readonly registry: CaseRegistry,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async forward(tracked: TrackedCase, communications: CaseCommunication[]): Promise<number> {
    const { kase, conversation } = tracked;
    const since = kase.lastCommunicationAt?.getTime() ?? conversation.createdAt.getTime();
    const fresh = communications
      .filter((comm) => comm.createdAt.getTime() > since)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    if (fresh.length === 0) {
      return 0;
    }

    const { communicationMaxLength } = this.config.limits();
    const notices = fresh
      .filter((comm) => !isChatOriginated(comm.body))
      .map((comm) => communicationNotice(conversation, kase, comm, communicationMaxLength));

    // Chat-originated messages still move the watermark
    const watermark = fresh[fresh.length - 1].createdAt;
    const enqueued = await this.registry.recordCommunications(kase.accountKey, kase.caseId, notices, watermark);

    this.logger.info(
      {
        accountKey: kase.accountKey,
        caseId: kase.caseId,
        conversationId: conversation.conversationId,
        enqueued,
        skipped: fresh.length - notices.length,
      },
      'Case communications forwarded',
    );
    return enqueued;
  }
}
