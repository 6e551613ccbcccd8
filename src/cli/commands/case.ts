import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printTable, printSuccess, printError, printInfo, formatDate, formatCaseStatus, formatOutcome } from '../utils/output';
import { isCaseStatus } from '../../core/domain/caseStatus';
import { AlreadyExistsError, describeError } from '../../core/domain/errors';
import type { TrackedCase } from '../../core/ports';

const PAGE_SIZE = 200;

// Register case registry commands (list, inspect, link, transitions)
export function registerCaseCommands(program: Command): void {
  const caseCmd = program
    .command('case')
    .description('Case registry commands');

  // list walks live conversations account by account
  caseCmd
    .command('list')
    .description('List cases with a live conversation')
    .option('-a, --account <accountKey>', 'Only this account')
    .action(async (options: { account?: string }) => {
      try {
        const { registry, config, disconnect } = await getCliContainer();
        const accountKeys = options.account ? [options.account] : config.accounts().map((a) => a.key);

        const tracked: TrackedCase[] = [];
        for (const accountKey of accountKeys) {
          let after: string | undefined;
          for (;;) {
            const page = await registry.listLive(accountKey, { afterConversationId: after, limit: PAGE_SIZE });
            tracked.push(...page);
            if (page.length < PAGE_SIZE) break;
            after = page[page.length - 1].conversation.conversationId;
          }
        }

        if (tracked.length === 0) {
          printInfo('No live conversations');
          await disconnect();
          return;
        }

        console.log(`\nFound ${tracked.length} live case(s):\n`);
        printTable(
          ['Account', 'Case', 'Display ID', 'Status', 'Conversation', 'Resolved At'],
          tracked.map(({ kase, conversation }) => [
            kase.accountKey,
            kase.caseId,
            kase.displayId,
            formatCaseStatus(kase.status),
            conversation.conversationId,
            formatDate(conversation.resolvedAt),
          ]),
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to list cases: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // inspect shows the case record, its live conversation and the transition trail
  caseCmd
    .command('inspect <accountKey> <caseId>')
    .description('View detailed information about a case')
    .action(async (accountKey: string, caseId: string) => {
      try {
        const { registry, disconnect } = await getCliContainer();
        const conversation = await registry.lookupByCase(accountKey, caseId);
        const tracked = conversation ? await registry.lookupByConversation(conversation.conversationId) : null;

        if (!tracked) {
          printError(`No live conversation for case ${caseId} on account ${accountKey}`);
          await disconnect();
          process.exit(1);
        }

        const { kase } = tracked;
        console.log('\n=== Case Details ===\n');
        printTable(
          ['Field', 'Value'],
          [
            ['Account', kase.accountKey],
            ['Case ID', kase.caseId],
            ['Display ID', kase.displayId],
            ['Subject', kase.subject || '-'],
            ['Status', formatCaseStatus(kase.status)],
            ['Status At', formatDate(kase.statusAt)],
            ['Last Communication', formatDate(kase.lastCommunicationAt)],
            ['Version', kase.version.toString()],
            ['Conversation', tracked.conversation.conversationId],
            ['Creator', tracked.conversation.creatorId],
            ['Created At', formatDate(tracked.conversation.createdAt)],
            ['Resolved At', formatDate(tracked.conversation.resolvedAt)],
            ['Warned At', formatDate(tracked.conversation.warnedAt)],
          ],
        );

        const transitions = await registry.listTransitions(accountKey, caseId);
        if (transitions.length > 0) {
          console.log('\n=== Transitions ===\n');
          printTable(
            ['Processed At', 'Source', 'From', 'To', 'Outcome'],
            transitions.map((t) => [
              formatDate(t.processedAt),
              t.source,
              t.previousStatus,
              t.observedStatus,
              formatOutcome(t.outcome),
            ]),
          );
        }

        await disconnect();
      } catch (error) {
        printError(`Failed to inspect case: ${describeError(error)}`);
        process.exit(1);
      }
    });

  // link records a conversation for a case, the same write the chat side performs
  caseCmd
    .command('link <accountKey> <caseId> <conversationId>')
    .description('Link a case to a conversation')
    .requiredOption('-c, --creator <userId>', 'User who opened the conversation')
    .option('-d, --display-id <displayId>', 'Human readable case id')
    .option('-s, --status <status>', 'Current case status', 'OPEN')
    .action(
      async (
        accountKey: string,
        caseId: string,
        conversationId: string,
        options: { creator: string; displayId?: string; status: string },
      ) => {
        try {
          if (!isCaseStatus(options.status)) {
            printError('Status must be one of OPEN, PENDING, RESOLVED, REOPENED');
            process.exit(1);
          }

          const { registry, config, disconnect } = await getCliContainer();
          if (!config.account(accountKey)) {
            printError(`Account ${accountKey} is not configured`);
            await disconnect();
            process.exit(1);
          }

          await registry.createMapping({
            accountKey,
            caseId,
            conversationId,
            creatorId: options.creator,
            displayId: options.displayId,
            status: options.status,
          });

          printSuccess(`Case ${caseId} linked to conversation ${conversationId}`);
          await disconnect();
        } catch (error) {
          if (error instanceof AlreadyExistsError) {
            printError(`Case is already linked to conversation ${error.existingConversationId}`);
          } else {
            printError(`Failed to link case: ${describeError(error)}`);
          }
          process.exit(1);
        }
      },
    );

  // transitions lists every recorded observation, applied or rejected
  caseCmd
    .command('transitions <accountKey> <caseId>')
    .description('View the transition log for a case')
    .action(async (accountKey: string, caseId: string) => {
      try {
        const { registry, disconnect } = await getCliContainer();
        const transitions = await registry.listTransitions(accountKey, caseId);

        if (transitions.length === 0) {
          printInfo(`No transitions recorded for case ${caseId}`);
          await disconnect();
          return;
        }

        printTable(
          ['Processed At', 'Source', 'From', 'To', 'Outcome', 'Dedup Key'],
          transitions.map((t) => [
            formatDate(t.processedAt),
            t.source,
            t.previousStatus,
            t.observedStatus,
            formatOutcome(t.outcome),
            t.dedupKey.slice(0, 12) + '...',
          ]),
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to list transitions: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
