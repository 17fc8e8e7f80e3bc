import { Command } from 'commander';
import { loadConfigFromProcess } from '../../config/config';
import { configureLogger } from '../../utils/logger';
import { Orchestrator } from '../../services/Orchestrator';
import { runCommand } from '../runCommand';
import { printSummary } from './summary';

async function provision(linkOnly: boolean): Promise<number> {
  const config = loadConfigFromProcess();
  configureLogger(config.logging);

  const result = await new Orchestrator(config).provision();
  if (linkOnly) {
    console.log(result.link);
  } else {
    printSummary(result);
  }
  return 0;
}

export function provisionCommand(program: Command): void {
  program
    .command('provision')
    .description('Prepare certificate, binary, credential and config, print the summary, do not start the relay')
    .action(() => runCommand(() => provision(false)));

  program
    .command('link')
    .description('Provision like "provision" and print only the share link')
    .action(() => runCommand(() => provision(true)));
}
