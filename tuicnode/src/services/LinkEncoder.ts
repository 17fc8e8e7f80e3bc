import type { Credential } from '../managers/CredentialStore';
import type { NodeNetworkInfo } from './NetworkInfoResolver';
import { CONGESTION_CONTROLLER, HTTP3_ALPN, MAX_EXTERNAL_PACKET_SIZE } from './ConfigSynthesizer';

export const LINK_SCHEME = 'tuic';

export interface LinkOptions {
  labelPrefix: string;
}

/**
 * Share link for clients. Query parameter order is fixed.
 */
export function encodeLink(
  credential: Credential,
  network: Pick<NodeNetworkInfo, 'ip' | 'countryCode'>,
  port: number,
  masqueradeDomain: string,
  options: LinkOptions = { labelPrefix: 'TUIC-' }
): string {
  const userinfo = `${encodeURIComponent(credential.id)}:${encodeURIComponent(credential.secret)}`;
  const params: Array<[string, string]> = [
    ['congestion_control', CONGESTION_CONTROLLER],
    ['alpn', HTTP3_ALPN.join(',')],
    ['allowInsecure', '1'],
    ['sni', masqueradeDomain],
    ['udp_relay_mode', 'native'],
    ['disable_sni', '0'],
    ['reduce_rtt', '1'],
    ['max_udp_relay_packet_size', String(MAX_EXTERNAL_PACKET_SIZE)],
  ];
  const query = params.map(([name, value]) => `${name}=${encodeURIComponent(value)}`).join('&');
  const label = encodeURIComponent(`${options.labelPrefix}${network.countryCode}`);

  return `${LINK_SCHEME}://${userinfo}@${network.ip}:${port}?${query}#${label}`;
}
