import { formatSummary, ProvisionResult } from '../../services/Orchestrator';

export function printSummary(result: ProvisionResult): void {
  for (const line of formatSummary(result)) {
    console.log(line);
  }
}
