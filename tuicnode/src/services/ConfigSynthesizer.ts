import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { ConfigRenderError, describeError } from '../utils/errors';
import { cryptoRandom, RandomSource } from '../utils/random';
import type { Credential } from '../managers/CredentialStore';

export interface CertificatePaths {
  certificate: string;
  privateKey: string;
}

export interface ServerConfigInput {
  port: number;
  credential: Credential;
  certPaths: CertificatePaths;
  alpn: readonly string[];
  masqueradeDomain: string;
}

export interface ServerConfig {
  log_level: 'off';
  server: string;
  udp_relay_ipv6: boolean;
  zero_rtt_handshake: boolean;
  dual_stack: boolean;
  auth_timeout: string;
  task_negotiation_timeout: string;
  gc_interval: string;
  gc_lifetime: string;
  max_external_packet_size: number;
  users: Record<string, string>;
  tls: {
    self_sign: boolean;
    certificate: string;
    private_key: string;
    alpn: string[];
  };
  restful: {
    addr: string;
    secret: string;
    maximum_clients_per_user: number;
  };
  quic: {
    initial_mtu: number;
    min_mtu: number;
    gso: boolean;
    pmtu: boolean;
    send_window: number;
    receive_window: number;
    max_idle_time: string;
    congestion_control: {
      controller: 'bbr';
      initial_window: number;
    };
  };
}

export interface RenderedServerConfig {
  config: ServerConfig;
  document: string;
}

export const HTTP3_ALPN = ['h3'] as const;

export const MAX_EXTERNAL_PACKET_SIZE = 8192;

export const CONGESTION_CONTROLLER = 'bbr';

export function buildServerConfig(input: ServerConfigInput, adminSecret: string): ServerConfig {
  return {
    log_level: 'off',
    server: `0.0.0.0:${input.port}`,
    udp_relay_ipv6: false,
    zero_rtt_handshake: true,
    dual_stack: false,
    auth_timeout: '10s',
    task_negotiation_timeout: '5s',
    gc_interval: '10s',
    gc_lifetime: '10s',
    max_external_packet_size: MAX_EXTERNAL_PACKET_SIZE,
    users: {
      [input.credential.id]: input.credential.secret,
    },
    tls: {
      self_sign: false,
      certificate: input.certPaths.certificate,
      private_key: input.certPaths.privateKey,
      alpn: [...input.alpn],
    },
    restful: {
      addr: `127.0.0.1:${input.port}`,
      secret: adminSecret,
      maximum_clients_per_user: 999999999,
    },
    quic: {
      initial_mtu: 1500,
      min_mtu: 1200,
      gso: true,
      pmtu: true,
      send_window: 8 * 1024 * 1024,
      receive_window: 4 * 1024 * 1024,
      max_idle_time: '20s',
      congestion_control: {
        controller: CONGESTION_CONTROLLER,
        initial_window: 4 * 1024 * 1024,
      },
    },
  };
}

function str(value: string): string {
  return JSON.stringify(value);
}

function key(name: string): string {
  return /^[A-Za-z0-9_-]+$/.test(name) ? name : str(name);
}

function list(values: readonly string[]): string {
  return `[${values.map(str).join(', ')}]`;
}

/**
 * TOML rendering with a fixed key order, so identical input always yields
 * identical bytes.
 */
export function renderServerConfig(config: ServerConfig): string {
  const users = Object.entries(config.users)
    .map(([id, secret]) => `${key(id)} = ${str(secret)}`)
    .join('\n');
  const { tls, restful, quic } = config;

  return `log_level = ${str(config.log_level)}
server = ${str(config.server)}

udp_relay_ipv6 = ${config.udp_relay_ipv6}
zero_rtt_handshake = ${config.zero_rtt_handshake}
dual_stack = ${config.dual_stack}
auth_timeout = ${str(config.auth_timeout)}
task_negotiation_timeout = ${str(config.task_negotiation_timeout)}
gc_interval = ${str(config.gc_interval)}
gc_lifetime = ${str(config.gc_lifetime)}
max_external_packet_size = ${config.max_external_packet_size}

[users]
${users}

[tls]
self_sign = ${tls.self_sign}
certificate = ${str(tls.certificate)}
private_key = ${str(tls.private_key)}
alpn = ${list(tls.alpn)}

[restful]
addr = ${str(restful.addr)}
secret = ${str(restful.secret)}
maximum_clients_per_user = ${restful.maximum_clients_per_user}

[quic]
initial_mtu = ${quic.initial_mtu}
min_mtu = ${quic.min_mtu}
gso = ${quic.gso}
pmtu = ${quic.pmtu}
send_window = ${quic.send_window}
receive_window = ${quic.receive_window}
max_idle_time = ${str(quic.max_idle_time)}

[quic.congestion_control]
controller = ${str(quic.congestion_control.controller)}
initial_window = ${quic.congestion_control.initial_window}
`;
}

export class ConfigSynthesizer {
  private random: RandomSource;

  constructor(random: RandomSource = cryptoRandom) {
    this.random = random;
  }

  /**
   * Writes the relay configuration to `outputPath`. The admin endpoint secret
   * is sampled on every call and never persisted elsewhere.
   */
  async render(outputPath: string, input: ServerConfigInput): Promise<RenderedServerConfig> {
    const config = buildServerConfig(input, this.random.hex(16));
    const document = renderServerConfig(config);

    try {
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, document, { mode: 0o600 });
    } catch (error) {
      throw new ConfigRenderError(`Failed to write server config to ${outputPath}: ${describeError(error)}`);
    }

    logger.info('Server config written', {
      path: outputPath,
      listen: config.server,
      masqueradeDomain: input.masqueradeDomain,
    });
    return { config, document };
  }
}
