import type { ReconciliationPoller } from '../../core/application/ReconciliationPoller';
import { startPeriodicWorker, type WorkerHandle } from './periodic';

// Dependencies for reconciliation worker
export interface PollWorkerDeps {
  poller: ReconciliationPoller;
  intervalMs: number;
}

// Start background worker that reconciles every account's live cases with the backend
export const startPollWorker = ({ poller, intervalMs }: PollWorkerDeps): WorkerHandle =>
  startPeriodicWorker({
    name: 'reconciliation-poller',
    intervalMs,
    tick: async () => {
      await poller.runCycle();
    },
  });
