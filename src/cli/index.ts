#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerCaseCommands } from './commands/case';
import { registerSystemCommands } from './commands/system';
import { registerOutboxCommands } from './commands/outbox';
import { registerConfigCommands } from './commands/config';
import { describeError } from '../core/domain/errors';

const program = new Command();

program
  .name('casebridge')
  .description('casebridge CLI - Admin tools for the case synchronization engine')
  .version('0.1.0');

registerCaseCommands(program);
registerSystemCommands(program);
registerOutboxCommands(program);
registerConfigCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', describeError(error));
  process.exit(1);
});
