import { createHash } from 'crypto';
import type { CaseCommunication, CaseRecord, Conversation, Notice, TransitionRecord } from '../ports';

// Templates are referenced by key and resolved against the message templates
// at delivery time, so a queued notice survives a template edit.

export const transitionNotice = (
  transition: TransitionRecord,
  conversation: Conversation,
  kase: CaseRecord,
): Notice => ({
  conversationId: conversation.conversationId,
  kind: 'transition',
  template: `transition.${transition.observedStatus}`,
  data: {
    case_id: kase.caseId,
    display_id: kase.displayId,
    account: kase.accountKey,
    from: transition.previousStatus,
    to: transition.observedStatus,
  },
  identity: `transition:${transition.id}`,
});

export const warningNotice = (conversation: Conversation, kase: CaseRecord, archiveAt: Date): Notice => ({
  conversationId: conversation.conversationId,
  kind: 'warning',
  template: 'lifecycle.warning',
  data: {
    case_id: kase.caseId,
    display_id: kase.displayId,
    archive_at: archiveAt.toISOString(),
  },
  // One warning per resolution: a reopen-and-resolve cycle earns a new one.
  identity: `warn:${conversation.conversationId}:${conversation.resolvedAt?.getTime() ?? 0}`,
});

export const archiveNotice = (conversation: Conversation, kase: CaseRecord): Notice => ({
  conversationId: conversation.conversationId,
  kind: 'archive',
  template: 'lifecycle.archive',
  data: {
    case_id: kase.caseId,
    display_id: kase.displayId,
  },
  identity: `archive:${conversation.conversationId}`,
});

export const communicationNotice = (
  conversation: Conversation,
  kase: CaseRecord,
  communication: CaseCommunication,
  maxLength: number,
): Notice => {
  const fingerprint = createHash('sha256')
    .update(`${communication.createdAt.toISOString()}|${communication.submittedBy}|${communication.body}`)
    .digest('hex')
    .slice(0, 32);

  const body =
    communication.body.length > maxLength ? `${communication.body.slice(0, maxLength)}\n…(truncated)` : communication.body;

  return {
    conversationId: conversation.conversationId,
    kind: 'communication',
    template: 'communication',
    data: {
      case_id: kase.caseId,
      display_id: kase.displayId,
      author: communication.submittedBy || 'Console',
      sent_at: communication.createdAt.toISOString(),
      body,
    },
    identity: `comm:${kase.accountKey}:${kase.caseId}:${fingerprint}`,
  };
};

// Messages the chat side wrote into the case come back on the next read; they
// are tagged "[From <name> via chat]" and must not be echoed.
export const isChatOriginated = (body: string): boolean => body.startsWith('[From ') && body.includes('via chat]');
