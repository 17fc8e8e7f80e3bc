import { logger } from '../utils/logger';
import { AppError } from '../utils/errors';

export type ExitFn = (code: number) => void;

/**
 * Maps a command's outcome to the process exit code. AppErrors carry their
 * own code; anything else exits 1.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AppError ? error.exitCode : 1;
}

export async function runCommand(command: () => Promise<number>, exit: ExitFn = process.exit): Promise<void> {
  let code: number;
  try {
    code = await command();
  } catch (error) {
    if (error instanceof AppError) {
      console.error(`Error: ${error.message}`);
      logger.error('Fatal error', { code: error.code, message: error.message });
    } else {
      console.error('Error:', error);
      logger.error('Unexpected error', { error });
    }
    code = exitCodeFor(error);
  }
  exit(code);
}
