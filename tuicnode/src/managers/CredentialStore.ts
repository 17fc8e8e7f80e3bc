import fs from 'fs';
import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { CredentialError, describeError } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';

export interface Credential {
  /** UUID, or 32 hex characters when no UUID source was available */
  id: string;
  /** 32 hex characters */
  secret: string;
}

export type IdSource = () => string;

const KERNEL_UUID_PATH = '/proc/sys/kernel/random/uuid';

const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const HEX_ID_PATTERN = /^[0-9a-fA-F]{32}$/;

const credentialSchema = z.object({
  id: z.string().refine((id) => UUID_PATTERN.test(id) || HEX_ID_PATTERN.test(id), 'not a UUID'),
  secret: z.string().regex(/^[0-9a-fA-F]{32}$/, 'not 32 hex characters'),
});

export const kernelUuidSource: IdSource = () => fs.readFileSync(KERNEL_UUID_PATH, 'utf-8').trim();

export const libraryUuidSource: IdSource = () => uuidv4();

export const randomHexSource: IdSource = () => randomBytes(16).toString('hex');

export const DEFAULT_ID_SOURCES: readonly IdSource[] = [kernelUuidSource, libraryUuidSource, randomHexSource];

export function parseCredential(content: string): Credential {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (lines.length !== 2) {
    throw new CredentialError(`Expected 2 lines, found ${lines.length}`);
  }

  const result = credentialSchema.safeParse({ id: lines[0].trim(), secret: lines[1].trim() });
  if (!result.success) {
    throw new CredentialError(
      `Malformed credential: ${result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join(', ')}`
    );
  }
  return result.data;
}

export function serializeCredential(credential: Credential): string {
  return `${credential.id}\n${credential.secret}\n`;
}

export class CredentialStore {
  private idSources: readonly IdSource[];

  constructor(idSources: readonly IdSource[] = DEFAULT_ID_SOURCES) {
    this.idSources = idSources;
  }

  /**
   * Returns the persisted credential, creating it on first use. A file that
   * cannot be parsed is replaced with a fresh credential.
   */
  async loadOrCreate(filePath: string): Promise<Credential> {
    if (fs.existsSync(filePath)) {
      try {
        const credential = parseCredential(await fs.promises.readFile(filePath, 'utf-8'));
        logger.info('Loaded existing credential', { path: filePath });
        return credential;
      } catch (error) {
        logger.warn('Stored credential is invalid, generating a new one', {
          path: filePath,
          error: describeError(error),
        });
      }
    }

    const credential: Credential = {
      id: this.generateId(),
      secret: randomBytes(16).toString('hex'),
    };
    await this.persist(filePath, credential);
    logger.info('Generated and saved new credential', { path: filePath });

    return credential;
  }

  private generateId(): string {
    for (const source of this.idSources) {
      try {
        const id = source();
        if (UUID_PATTERN.test(id) || HEX_ID_PATTERN.test(id)) {
          return id;
        }
      } catch (error) {
        logger.debug('UUID source unavailable, trying the next one', { error: describeError(error) });
      }
    }
    return randomHexSource();
  }

  private async persist(filePath: string, credential: Credential): Promise<void> {
    try {
      await writeFileAtomic(filePath, serializeCredential(credential), 0o600);
    } catch (error) {
      throw new CredentialError(`Failed to save credential to ${filePath}: ${describeError(error)}`);
    }
  }
}
