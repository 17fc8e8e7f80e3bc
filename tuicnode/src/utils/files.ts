import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

/**
 * Writes `content` to a temp file beside `filePath` and renames it into
 * place, so readers see either the old file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string, mode = 0o644): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.promises.writeFile(tempPath, content, { mode });
    await fs.promises.rename(tempPath, filePath);
  } finally {
    await fs.promises.rm(tempPath, { force: true });
  }
}
