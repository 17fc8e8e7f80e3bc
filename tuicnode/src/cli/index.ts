#!/usr/bin/env node

import { Command } from 'commander';
import { startCommand } from './commands/start';
import { provisionCommand } from './commands/provision';
import { runCommand } from './runCommand';

const program = new Command();

program
  .name('tuicnode')
  .description('Provision and run a single TUIC relay node')
  .version('1.0.0');

program
  .command('start', { isDefault: true })
  .description('Provision the node and run the relay in the foreground')
  .action(() => runCommand(startCommand));

provisionCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
