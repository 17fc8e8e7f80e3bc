import os from 'os';
import { spawn as nodeSpawn, SpawnOptions } from 'child_process';
import type { Config } from '../config/config';
import { logger } from '../utils/logger';
import { LaunchError, describeError } from '../utils/errors';
import { createSeededRandom, cryptoRandom, RandomSource } from '../utils/random';
import { CertificateManager, EnsureCertificateResult } from '../managers/CertificateManager';
import { Credential, CredentialStore } from '../managers/CredentialStore';
import { BinaryProvisioner } from './BinaryProvisioner';
import { ConfigSynthesizer, HTTP3_ALPN, RenderedServerConfig } from './ConfigSynthesizer';
import { NetworkInfoResolver, NodeNetworkInfo } from './NetworkInfoResolver';
import { encodeLink } from './LinkEncoder';

export interface ProvisionResult {
  masqueradeDomain: string;
  port: number;
  certificate: EnsureCertificateResult;
  credential: Credential;
  serverConfig: RenderedServerConfig;
  network: NodeNetworkInfo;
  link: string;
  binaryPath: string;
  configPath: string;
}

/** The part of a ChildProcess the launcher listens to. */
export interface RelayProcess {
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => RelayProcess;

export interface OrchestratorDeps {
  certificates: Pick<CertificateManager, 'ensure'>;
  binaries: Pick<BinaryProvisioner, 'ensure'>;
  credentials: Pick<CredentialStore, 'loadOrCreate'>;
  synthesizer: Pick<ConfigSynthesizer, 'render'>;
  network: Pick<NetworkInfoResolver, 'resolve'>;
  random: RandomSource;
  spawn: SpawnFn;
}

export function createDefaultDeps(config: Readonly<Config>): OrchestratorDeps {
  return {
    certificates: new CertificateManager({ validityDays: config.certificate.validityDays }),
    binaries: new BinaryProvisioner({
      downloadUrl: config.relay.downloadUrl,
      timeoutMs: config.relay.downloadTimeoutMs,
    }),
    credentials: new CredentialStore(),
    synthesizer: new ConfigSynthesizer(),
    network: new NetworkInfoResolver({
      ipEchoUrls: config.network.ipEchoUrls,
      geoUrl: config.network.geoUrl,
      timeoutMs: config.network.timeoutMs,
      ipPlaceholder: config.network.ipPlaceholder,
      unknownCountry: config.network.unknownCountry,
    }),
    random: config.masquerade.seed ? createSeededRandom(config.masquerade.seed) : cryptoRandom,
    spawn: nodeSpawn,
  };
}

export function formatSummary(result: ProvisionResult): string[] {
  return [
    `SNI/masquerade domain: ${result.masqueradeDomain}`,
    `Server IP: ${result.network.ip}:${result.port}`,
    `UUID: ${result.credential.id}`,
    `Password: ${result.credential.secret}`,
    `TUIC link: ${result.link}`,
  ];
}

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  const value: unknown = entry?.[1];
  return 128 + (typeof value === 'number' ? value : 0);
}

/**
 * Runs the provisioning stages in order and hands the process over to the
 * relay binary. Stage failures are fatal AppErrors and are not caught here;
 * network lookups degrade instead of failing.
 */
export class Orchestrator {
  private config: Readonly<Config>;
  private deps: OrchestratorDeps;

  constructor(config: Readonly<Config>, deps: OrchestratorDeps = createDefaultDeps(config)) {
    this.config = config;
    this.deps = deps;
  }

  async provision(): Promise<ProvisionResult> {
    const { paths, server } = this.config;
    const masqueradeDomain = this.deps.random.pick(this.config.masquerade.domains);
    logger.info('Provisioning relay node', { masqueradeDomain, port: server.port });

    const certificate = await this.deps.certificates.ensure(paths.certificate, paths.privateKey, masqueradeDomain);
    if (certificate.certificate.commonName !== masqueradeDomain) {
      logger.info('Reused certificate was issued for another domain', {
        commonName: certificate.certificate.commonName,
        masqueradeDomain,
      });
    }

    await this.deps.binaries.ensure(paths.binary);

    const credential = await this.deps.credentials.loadOrCreate(paths.credentials);

    const serverConfig = await this.deps.synthesizer.render(paths.serverConfig, {
      port: server.port,
      credential,
      certPaths: { certificate: paths.certificate, privateKey: paths.privateKey },
      alpn: HTTP3_ALPN,
      masqueradeDomain,
    });

    const network = await this.deps.network.resolve();
    if (network.degraded.length > 0) {
      logger.warn('Continuing with substituted network info', {
        lookups: network.degraded.map((entry) => entry.lookup),
      });
    }

    const link = encodeLink(credential, network, server.port, masqueradeDomain, {
      labelPrefix: this.config.link.labelPrefix,
    });

    return {
      masqueradeDomain,
      port: server.port,
      certificate,
      credential,
      serverConfig,
      network,
      link,
      binaryPath: paths.binary,
      configPath: paths.serverConfig,
    };
  }

  /**
   * Starts `<binary> -c <config>` with inherited stdio and resolves with its
   * exit code. No signal handlers are installed; the relay owns its own
   * shutdown.
   */
  launch(result: Pick<ProvisionResult, 'binaryPath' | 'configPath'>): Promise<number> {
    logger.info('Starting relay in the foreground', { binary: result.binaryPath });

    return new Promise((resolve, reject) => {
      let child: RelayProcess;
      try {
        child = this.deps.spawn(result.binaryPath, ['-c', result.configPath], { stdio: 'inherit' });
      } catch (error) {
        reject(new LaunchError(`Failed to start ${result.binaryPath}: ${describeError(error)}`));
        return;
      }

      child.once('error', (error) => {
        reject(new LaunchError(`Failed to start ${result.binaryPath}: ${error.message}`));
      });
      child.once('exit', (code, signal) => {
        if (signal) {
          logger.info('Relay terminated by signal', { signal });
          resolve(signalExitCode(signal));
          return;
        }
        logger.info('Relay exited', { code });
        resolve(code ?? 0);
      });
    });
  }
}
