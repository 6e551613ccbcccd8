import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printTable, printSuccess, printError, printInfo, printWarning, formatCaseStatus, formatStatus } from '../utils/output';
import { describeError } from '../../core/domain/errors';

// Register system commands (status, poll, sweep)
export function registerSystemCommands(program: Command): void {
  // status shows database health, case counts by status, and outbox queue status
  program
    .command('status')
    .description('Show system health and statistics')
    .action(async () => {
      try {
        const { registry, db, config, disconnect } = await getCliContainer();

        try {
          db.prepare('select 1').get();
          printSuccess('Database connection: OK');
        } catch (error) {
          printError(`Database connection: FAILED (${describeError(error)})`);
        }

        const stats = await registry.stats();

        console.log(`\n=== Accounts: ${config.accounts().map((a) => a.key).join(', ')} ===\n`);

        console.log('Case Statistics:');
        printTable(
          ['Status', 'Count'],
          Object.entries(stats.cases).map(([status, count]) => [formatCaseStatus(status), count.toString()]),
        );

        console.log('\nOutbox Statistics:');
        printTable(
          ['Status', 'Count'],
          Object.entries(stats.outbox).map(([status, count]) => [formatStatus(status), count.toString()]),
        );

        printInfo(`\n${stats.liveConversations} live / ${stats.archivedConversations} archived conversation(s)`);

        await disconnect();
      } catch (error) {
        printError(`Failed to get status: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // poll runs one reconciliation cycle against the ticketing backend
  program
    .command('poll')
    .description('Run one reconciliation cycle')
    .action(async () => {
      try {
        const { engine, disconnect } = await getCliContainer();
        const summary = await engine.poller.runCycle();
        printTable(
          ['Account', 'Checked', 'Applied', 'Duplicates', 'Rejected', 'Messages', 'Failed Cases', 'Error'],
          summary.accounts.map((r) => [
            r.accountKey,
            r.checked.toString(),
            r.applied.toString(),
            r.duplicates.toString(),
            r.rejected.toString(),
            r.communications.toString(),
            r.failedCases.toString(),
            r.error ?? '-',
          ]),
        );

        if (summary.failedAccounts > 0) {
          printWarning(`${summary.failedAccounts} account(s) failed this cycle`);
        } else {
          printSuccess(`Cycle finished, ${summary.applied} transition(s) applied`);
        }
        await disconnect();
      } catch (error) {
        printError(`Failed to poll: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // sweep runs one lifecycle cycle: warnings and archives that are due
  program
    .command('sweep')
    .description('Run one lifecycle sweep')
    .action(async () => {
      try {
        const { engine, disconnect } = await getCliContainer();
        const summary = await engine.scheduler.runCycle();

        printTable(
          ['Scanned', 'Warned', 'Archived', 'Skipped'],
          [[summary.scanned, summary.warned, summary.archived, summary.skipped].map(String)],
        );
        printInfo('Notices are queued; the running service delivers them');
        await disconnect();
      } catch (error) {
        printError(`Failed to sweep: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
