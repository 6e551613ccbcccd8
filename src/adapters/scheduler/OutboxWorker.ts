import type { Config, OutboxRepository } from '../../core/ports';
import type { OutboundNotifier } from '../../core/application/OutboundNotifier';
import { describeError } from '../../core/domain/errors';
import { logger } from '../../infra/logger';
import { startPeriodicWorker, type WorkerHandle } from './periodic';

// Dependencies for outbox worker
export interface OutboxWorkerDeps {
  outbox: OutboxRepository;
  notifier: OutboundNotifier;
  policy: Config;
  batchSize?: number;
  intervalMs?: number;
}

// Start background worker that periodically drains outbox queue and sends notifications
// Returns handle to gracefully stop the worker
export const startOutboxWorker = ({
  outbox,
  notifier,
  policy,
  batchSize = 10,
  intervalMs = 2000,
}: OutboxWorkerDeps): WorkerHandle =>
  startPeriodicWorker({
    name: 'outbox',
    intervalMs,
    tick: async () => {
      // Keep draining while full batches come back so a backlog clears in one tick
      let taken: number;
      do {
        taken = await processOutboxBatch(outbox, notifier, policy, batchSize);
      } while (taken === batchSize);
    },
  });

// Process a batch of pending outbox messages with exponential backoff retry
// Returns the number of jobs taken
export const processOutboxBatch = async (
  outbox: OutboxRepository,
  notifier: OutboundNotifier,
  policy: Config,
  batchSize: number,
): Promise<number> => {
  // Fetch up to batchSize messages ready for sending (takeDue leases them for 60s)
  const jobs = await outbox.takeDue(batchSize);
  if (jobs.length === 0) {
    return 0;
  }

  // Get retry limits and backoff intervals from policy
  const limits = policy.limits();
  const backoffs = limits.notificationBackoffSeconds;

  // Process each job independently so one failure doesn't stop others
  for (const job of jobs) {
    try {
      await notifier.deliver(job);

      // Mark as successfully sent
      await outbox.markSent(job.id);
      logger.info(
        { jobId: job.id, kind: job.kind, conversationId: job.conversationId, identity: job.identity },
        'Outbox job delivered',
      );
    } catch (err) {
      const errorMessage = describeError(err);

      // Check if we've exceeded max retry attempts
      if (job.attempts >= limits.maxNotificationRetries) {
        // Give up permanently
        await outbox.markPermanentlyFailed(job.id, errorMessage);
        logger.error(
          { jobId: job.id, attempts: job.attempts, maxRetries: limits.maxNotificationRetries, err },
          'Outbox job permanently failed after max retries',
        );
      } else {
        // Schedule retry with backoff
        // Math.min ensures we don't go beyond the backoffs array length
        // ?? provides fallback to 60s if array is empty
        const delaySeconds = backoffs[Math.min(job.attempts, backoffs.length - 1)] ?? 60;
        const retryAt = new Date(Date.now() + delaySeconds * 1000);
        await outbox.markFailed(job.id, errorMessage, retryAt);
        logger.warn({ jobId: job.id, attempts: job.attempts, err }, 'Outbox delivery failed, will retry');
      }
    }
  }

  return jobs.length;
};
