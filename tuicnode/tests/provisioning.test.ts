import fs from 'fs';
import path from 'path';
import { EventEmitter } from 'events';
import { loadConfig } from '../src/config/config';
import { CertificateManager } from '../src/managers/CertificateManager';
import { CredentialStore } from '../src/managers/CredentialStore';
import { BinaryProvisioner } from '../src/services/BinaryProvisioner';
import { ConfigSynthesizer } from '../src/services/ConfigSynthesizer';
import { NetworkInfoResolver } from '../src/services/NetworkInfoResolver';
import { Orchestrator, OrchestratorDeps } from '../src/services/Orchestrator';
import { createSeededRandom } from '../src/utils/random';
import { makeTempDir, removeDir } from './helpers';

describe('provisioning against a real working directory', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function orchestrator(now: Date): Orchestrator {
    const config = loadConfig({ WORK_DIR: dir, SERVER_PORT: '28888' });
    const http: { get: jest.Mock } = {
      get: jest.fn(async (url: string) => ({
        data: url.startsWith('https://api.ipify.org') ? '203.0.113.5' : 'US',
      })),
    };
    const deps: OrchestratorDeps = {
      certificates: new CertificateManager({ validityDays: 365, clock: () => now }),
      binaries: new BinaryProvisioner({ downloadUrl: config.relay.downloadUrl, timeoutMs: 1000, arch: 'x64' }, http),
      credentials: new CredentialStore(),
      synthesizer: new ConfigSynthesizer(),
      network: new NetworkInfoResolver(
        {
          ipEchoUrls: config.network.ipEchoUrls,
          geoUrl: config.network.geoUrl,
          timeoutMs: config.network.timeoutMs,
          ipPlaceholder: config.network.ipPlaceholder,
          unknownCountry: config.network.unknownCountry,
        },
        http
      ),
      random: createSeededRandom('provisioning'),
      spawn: () => new EventEmitter(),
    };
    return new Orchestrator(config, deps);
  }

  function mtimes(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const name of ['tuic-cert.pem', 'tuic-key.pem', 'tuic_user.txt', 'tuic-server']) {
      result[name] = fs.statSync(path.join(dir, name)).mtimeMs;
    }
    return result;
  }

  it('should converge to the same identity on a second run', async () => {
    fs.writeFileSync(path.join(dir, 'tuic-server'), '#!/bin/sh\n', { mode: 0o755 });
    const now = new Date('2026-03-01T00:00:00.000Z');

    const first = await orchestrator(now).provision();
    const before = mtimes();
    const second = await orchestrator(now).provision();

    expect(second.credential).toEqual(first.credential);
    expect(second.certificate.regenerated).toBe(false);
    expect(second.certificate.certificate.commonName).toBe(first.certificate.certificate.commonName);
    expect(second.certificate.certificate.notAfter).toEqual(first.certificate.certificate.notAfter);
    expect(second.link).toBe(first.link);
    expect(mtimes()).toEqual(before);
    expect(fs.readFileSync(path.join(dir, 'server.toml'), 'utf-8')).toBe(second.serverConfig.document);
  });

  it('should regenerate only the certificate once it has expired', async () => {
    fs.writeFileSync(path.join(dir, 'tuic-server'), '#!/bin/sh\n', { mode: 0o755 });

    const first = await orchestrator(new Date('2026-03-01T00:00:00.000Z')).provision();
    const second = await orchestrator(new Date('2027-03-02T00:00:00.000Z')).provision();

    expect(second.certificate.regenerated).toBe(true);
    expect(second.certificate.certificate.notAfter).toEqual(new Date('2028-03-01T00:00:00.000Z'));
    expect(second.certificate.certificate.keyPem).not.toBe(first.certificate.certificate.keyPem);
    expect(second.credential).toEqual(first.credential);
  });
});
