import fs from 'fs';
import path from 'path';
import {
  buildServerConfig,
  ConfigSynthesizer,
  renderServerConfig,
  ServerConfigInput,
} from '../src/services/ConfigSynthesizer';
import { ConfigRenderError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';
import { fixedRandom, makeTempDir, removeDir, TEST_CREDENTIAL } from './helpers';

const ADMIN_SECRET = '0123456789abcdef0123456789abcdef';

const input: ServerConfigInput = {
  port: 28888,
  credential: TEST_CREDENTIAL,
  certPaths: {
    certificate: 'proxy_files/tuic-cert.pem',
    privateKey: 'proxy_files/tuic-key.pem',
  },
  alpn: ['h3'],
  masqueradeDomain: 'www.bing.com',
};

const EXPECTED_DOCUMENT = `log_level = "off"
server = "0.0.0.0:28888"

udp_relay_ipv6 = false
zero_rtt_handshake = true
dual_stack = false
auth_timeout = "10s"
task_negotiation_timeout = "5s"
gc_interval = "10s"
gc_lifetime = "10s"
max_external_packet_size = 8192

[users]
11111111-1111-1111-1111-111111111111 = "deadbeefdeadbeefdeadbeefdeadbeef"

[tls]
self_sign = false
certificate = "proxy_files/tuic-cert.pem"
private_key = "proxy_files/tuic-key.pem"
alpn = ["h3"]

[restful]
addr = "127.0.0.1:28888"
secret = "0123456789abcdef0123456789abcdef"
maximum_clients_per_user = 999999999

[quic]
initial_mtu = 1500
min_mtu = 1200
gso = true
pmtu = true
send_window = 8388608
receive_window = 4194304
max_idle_time = "20s"

[quic.congestion_control]
controller = "bbr"
initial_window = 4194304
`;

function withoutSecret(document: string): string {
  return document
    .split('\n')
    .filter((line) => !line.startsWith('secret = '))
    .join('\n');
}

describe('buildServerConfig', () => {
  it('should derive listener, admin endpoint and tuning values', () => {
    const config = buildServerConfig(input, ADMIN_SECRET);

    expect(config.server).toBe('0.0.0.0:28888');
    expect(config.restful.addr).toBe('127.0.0.1:28888');
    expect(config.restful.secret).toBe(ADMIN_SECRET);
    expect(config.users).toEqual({ [TEST_CREDENTIAL.id]: TEST_CREDENTIAL.secret });
    expect(config.tls.alpn).toEqual(['h3']);
    expect(config.quic.send_window).toBe(8388608);
    expect(config.quic.receive_window).toBe(4194304);
    expect(config.quic.congestion_control).toEqual({ controller: 'bbr', initial_window: 4194304 });
  });
});

describe('renderServerConfig', () => {
  it('should render the exact relay document', () => {
    expect(renderServerConfig(buildServerConfig(input, ADMIN_SECRET))).toBe(EXPECTED_DOCUMENT);
  });

  it('should quote user keys that are not bare TOML keys', () => {
    const config = buildServerConfig({ ...input, credential: { id: 'a.b c', secret: 'x' } }, ADMIN_SECRET);

    expect(renderServerConfig(config)).toContain('\n"a.b c" = "x"\n');
  });

  it('should escape quotes and backslashes in paths', () => {
    const config = buildServerConfig(
      { ...input, certPaths: { certificate: 'dir\\"cert".pem', privateKey: 'key.pem' } },
      ADMIN_SECRET
    );

    expect(renderServerConfig(config)).toContain('\ncertificate = "dir\\\\\\"cert\\".pem"\n');
  });
});

describe('ConfigSynthesizer', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should write the rendered document to the output path', async () => {
    const outputPath = path.join(dir, 'server.toml');
    const synthesizer = new ConfigSynthesizer(fixedRandom(0, ADMIN_SECRET));

    const rendered = await synthesizer.render(outputPath, input);

    expect(rendered.document).toBe(EXPECTED_DOCUMENT);
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(EXPECTED_DOCUMENT);
  });

  it('should report the masquerade domain with the written path', async () => {
    const outputPath = path.join(dir, 'server.toml');
    const infoSpy = jest.spyOn(logger, 'info');

    await new ConfigSynthesizer(fixedRandom(0, ADMIN_SECRET)).render(outputPath, input);

    expect(infoSpy).toHaveBeenCalledWith('Server config written', {
      path: outputPath,
      listen: '0.0.0.0:28888',
      masqueradeDomain: 'www.bing.com',
    });
    infoSpy.mockRestore();
  });

  it('should keep every field but the admin secret identical across renders', async () => {
    const outputPath = path.join(dir, 'server.toml');
    const synthesizer = new ConfigSynthesizer();

    const first = await synthesizer.render(outputPath, input);
    const second = await synthesizer.render(outputPath, input);

    expect(withoutSecret(second.document)).toBe(withoutSecret(first.document));
    expect(withoutSecret(first.document)).toBe(withoutSecret(EXPECTED_DOCUMENT));
    expect(first.config.restful.secret).toMatch(/^[0-9a-f]{32}$/);
    expect(second.config.restful.secret).not.toBe(first.config.restful.secret);
  });

  it('should fail with a render error when the path cannot be written', async () => {
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, '');

    await expect(
      new ConfigSynthesizer().render(path.join(blocker, 'server.toml'), input)
    ).rejects.toBeInstanceOf(ConfigRenderError);
  });
});
