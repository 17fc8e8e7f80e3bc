import { loadConfigFromProcess } from '../../config/config';
import { configureLogger, logger } from '../../utils/logger';
import { Orchestrator } from '../../services/Orchestrator';
import { printSummary } from './summary';

export async function startCommand(): Promise<number> {
  const config = loadConfigFromProcess();
  configureLogger(config.logging);

  console.log('Initializing TUIC node...');
  logger.info('Starting tuicnode');

  const orchestrator = new Orchestrator(config);
  const result = await orchestrator.provision();
  printSummary(result);

  console.log('Starting TUIC server (foreground)...');
  return orchestrator.launch(result);
}
