import type { LifecycleScheduler } from '../../core/application/LifecycleScheduler';
import { startPeriodicWorker, type WorkerHandle } from './periodic';

// Dependencies for lifecycle worker
export interface LifecycleWorkerDeps {
  scheduler: LifecycleScheduler;
  intervalMs?: number;
}

// Start background worker that warns about and archives resolved conversations
// Runs every minute by default so warnings land close to their due time
export const startLifecycleWorker = ({ scheduler, intervalMs = 60_000 }: LifecycleWorkerDeps): WorkerHandle =>
  startPeriodicWorker({
    name: 'lifecycle-scheduler',
    intervalMs,
    tick: async () => {
      await scheduler.runCycle();
    },
  });
