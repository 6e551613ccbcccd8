import { logger as rootLogger } from '../../infra/logger';

// Handle to stop a periodic worker
export interface WorkerHandle {
  stop: () => Promise<void>;
}

export interface PeriodicWorkerOptions {
  name: string;
  intervalMs: number;
  tick: () => Promise<void>;
}

// Run tick immediately, then again intervalMs after each run finishes.
// Runs never overlap within one process; a failed run is logged and the
// schedule continues.
export const startPeriodicWorker = ({ name, intervalMs, tick }: PeriodicWorkerOptions): WorkerHandle => {
  const logger = rootLogger.child({ worker: name });
  // Store timer ID to allow cancellation
  let timer: NodeJS.Timeout | null = null;
  // Flag to signal worker should stop
  let stopped = false;
  // Promise of the run in progress, awaited by stop()
  let running: Promise<void> | null = null;

  const run = async (): Promise<void> => {
    // Exit early if stop() was called
    if (stopped) {
      return;
    }

    try {
      await tick();
    } catch (err) {
      // Log error but don't crash, continue polling
      logger.error({ err }, 'Worker tick failed');
    } finally {
      // Schedule next tick even if this one failed
      if (!stopped) {
        timer = setTimeout(() => {
          running = run();
        }, intervalMs);
      }
    }
  };

  logger.info({ intervalMs }, 'Worker started');
  // Start the polling loop immediately
  running = run();

  return {
    async stop() {
      // Signal worker to stop
      stopped = true;
      // Cancel any pending timeout
      if (timer) {
        clearTimeout(timer);
      }
      // Let an in-flight run finish before shutdown continues
      await running;
      logger.info('Worker stopped');
    },
  };
};
