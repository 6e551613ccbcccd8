import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printTable, printError } from '../utils/output';
import { describeError } from '../../core/domain/errors';

const seconds = (ms: number): string => `${ms / 1000}s`;

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Configuration viewing');

  configCmd
    .command('show')
    .description('Display current configuration')
    .action(async () => {
      try {
        const { config, disconnect } = await getCliContainer();

        console.log('\n=== Current Configuration ===\n');

        console.log('Accounts:');
        printTable(
          ['Key', 'Name', 'Role'],
          config.accounts().map((a) => [a.key, a.displayName, a.roleArn]),
        );

        const t = config.timings();
        console.log('\nTimings:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Grace Period', seconds(t.gracePeriodMs)],
            ['Warning Lead Time', seconds(t.warningLeadTimeMs)],
            ['Poll Interval', seconds(t.pollIntervalMs)],
            ['Lifecycle Interval', seconds(t.lifecycleIntervalMs)],
            ['Outbox Interval', seconds(t.outboxIntervalMs)],
            ['Dedup Window', seconds(t.dedupWindowMs)],
            ['Dedup Retention', seconds(t.dedupRetentionMs)],
            ['Renewal Margin', `${seconds(t.renewalSafetyMarginMs)} / ${t.renewalSafetyFraction}`],
            ['Call Timeout', seconds(t.callTimeoutMs)],
          ],
        );

        const limits = config.limits();
        console.log('\nLimits:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Max Notification Retries', limits.maxNotificationRetries.toString()],
            ['Notification Backoff (sec)', limits.notificationBackoffSeconds.join(', ')],
            ['Poll Fan-out', limits.pollFanOut.toString()],
            ['Poll Page Size', limits.pollPageSize.toString()],
            ['Outbox Batch Size', limits.outboxBatchSize.toString()],
            ['Communication Max Length', limits.communicationMaxLength.toString()],
          ],
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to show config: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
