import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import axios from 'axios';
import { logger } from '../utils/logger';
import { DownloadError, UnsupportedArchitectureError, describeError } from '../utils/errors';
import { getArchitecture, isSupportedArchitecture } from '../utils/platform';
import type { HttpGetter } from '../utils/network';

export interface BinaryProvisionerOptions {
  downloadUrl: string;
  timeoutMs: number;
  arch?: string;
}

export function isExecutable(filePath: string): boolean {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() && (stats.mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

/**
 * Makes sure the relay executable is present. The download is pinned to one
 * release and is not checksummed.
 */
export class BinaryProvisioner {
  private downloadUrl: string;
  private timeoutMs: number;
  private arch: string;
  private http: HttpGetter;

  constructor(options: BinaryProvisionerOptions, http: HttpGetter = axios) {
    this.downloadUrl = options.downloadUrl;
    this.timeoutMs = options.timeoutMs;
    this.arch = options.arch ?? getArchitecture();
    this.http = http;
  }

  async ensure(binaryPath: string): Promise<void> {
    if (isExecutable(binaryPath)) {
      logger.info('Relay binary already present', { path: binaryPath });
      return;
    }

    if (!isSupportedArchitecture(this.arch)) {
      throw new UnsupportedArchitectureError(this.arch);
    }

    logger.info('Downloading relay binary', { url: this.downloadUrl });
    await this.download(binaryPath);
    await fs.promises.chmod(binaryPath, 0o755);
    logger.info('Relay binary downloaded', { path: binaryPath });
  }

  private async download(binaryPath: string): Promise<void> {
    const partialPath = `${binaryPath}.download`;

    try {
      await fs.promises.mkdir(path.dirname(binaryPath), { recursive: true });
      const response = await this.http.get<Readable>(this.downloadUrl, {
        responseType: 'stream',
        timeout: this.timeoutMs,
        maxRedirects: 10,
      });
      await pipeline(response.data, fs.createWriteStream(partialPath));
      await fs.promises.rename(partialPath, binaryPath);
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true });
      throw new DownloadError(
        `Download failed (${describeError(error)}), fetch it manually from ${this.downloadUrl}`,
        this.downloadUrl
      );
    }
  }
}
