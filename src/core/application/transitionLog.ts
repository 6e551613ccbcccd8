import type { ApplyResult, Logger } from '../ports';

// Every outcome is logged; only an applied change ever reaches the chat.
export function logApplyResult(logger: Logger, result: ApplyResult, context: Record<string, unknown>): void {
  switch (result.outcome) {
    case 'applied':
      logger.info({ ...context, changed: result.changed, transitionId: result.transition.id }, 'Transition applied');
      break;
    case 'duplicate_ignored':
      logger.info({ ...context, dedupKey: result.dedupKey }, 'Duplicate transition ignored');
      break;
    case 'rejected_invalid_edge':
      logger.warn(
        {
          ...context,
          from: result.transition.previousStatus,
          to: result.transition.observedStatus,
          transitionId: result.transition.id,
        },
        'Transition rejected: illegal status edge',
      );
      break;
    case 'not_found':
      logger.debug(context, 'No live conversation for case, event dropped');
      break;
  }
}
