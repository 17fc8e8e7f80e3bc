import os from 'os';

/** Node's name for x86_64, the only architecture the relay is published for. */
export const SUPPORTED_ARCHITECTURE = 'x64';

export function getArchitecture(): string {
  return os.arch();
}

export function isSupportedArchitecture(arch: string): boolean {
  return arch === SUPPORTED_ARCHITECTURE;
}
