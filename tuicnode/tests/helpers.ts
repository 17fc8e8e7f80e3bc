import fs from 'fs';
import os from 'os';
import path from 'path';
import type { RandomSource } from '../src/utils/random';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tuicnode-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function fixedRandom(index: number, hex: string): RandomSource {
  return {
    next: () => 0,
    pick: <T>(items: readonly T[]): T => items[index],
    hex: () => hex,
  };
}

export const TEST_CREDENTIAL = {
  id: '11111111-1111-1111-1111-111111111111',
  secret: 'deadbeefdeadbeefdeadbeefdeadbeef',
};
