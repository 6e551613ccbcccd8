import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printTable, printSuccess, printError, printInfo, formatDate, formatStatus } from '../utils/output';
import { describeError } from '../../core/domain/errors';

// Register outbox (notification queue) management commands (list, retry, purge-failed)
export function registerOutboxCommands(program: Command): void {
  const outboxCmd = program
    .command('outbox')
    .description('Notification queue management');

  outboxCmd
    .command('list')
    .description('List outbox messages')
    .option('-s, --status <status>', 'Filter by status (pending, sent, failed)')
    .option('-l, --limit <limit>', 'Limit results', '20')
    .action(async (options: { status?: string; limit: string }) => {
      try {
        const { outbox, disconnect } = await getCliContainer();
        const messages = await outbox.list({ status: options.status, limit: parseInt(options.limit, 10) });

        if (messages.length === 0) {
          printInfo('No messages found');
          await disconnect();
          return;
        }

        console.log(`\nFound ${messages.length} message(s):\n`);
        printTable(
          ['ID', 'Kind', 'Conversation', 'Status', 'Attempts', 'Next Attempt', 'Last Error'],
          messages.map((m) => [
            m.id.slice(0, 8) + '...',
            m.kind,
            m.conversationId,
            formatStatus(m.status),
            m.attempts.toString(),
            formatDate(m.nextAttemptAt),
            m.lastError ? m.lastError.slice(0, 30) + '...' : '-',
          ]),
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to list outbox: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // retry requeues one failed message, or every failed message with --all
  outboxCmd
    .command('retry [jobId]')
    .description('Retry failed outbox messages')
    .option('--all', 'Retry every failed message')
    .action(async (jobId: string | undefined, options: { all?: boolean }) => {
      try {
        if (!jobId && !options.all) {
          printError('Pass a message id or --all');
          process.exit(1);
        }

        const { outbox, disconnect } = await getCliContainer();
        const count = await outbox.retryFailed(jobId);

        if (count === 0) {
          printInfo(jobId ? `Message ${jobId} is not in failed status` : 'No failed messages to retry');
        } else {
          printSuccess(`Queued ${count} message(s) for retry`);
        }
        await disconnect();
      } catch (error) {
        printError(`Failed to retry messages: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // purge-failed deletes all permanently failed messages (requires --yes confirmation)
  outboxCmd
    .command('purge-failed')
    .description('Delete all permanently failed messages')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (options: { yes?: boolean }) => {
      try {
        const { outbox, registry, disconnect } = await getCliContainer();
        const count = (await registry.stats()).outbox.failed ?? 0;

        if (count === 0) {
          printInfo('No failed messages to purge');
          await disconnect();
          return;
        }

        if (!options.yes) {
          printInfo(`Found ${count} failed message(s). Use --yes to confirm deletion.`);
          await disconnect();
          return;
        }

        const purged = await outbox.purgeFailed();
        printSuccess(`Purged ${purged} failed message(s)`);
        await disconnect();
      } catch (error) {
        printError(`Failed to purge messages: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
