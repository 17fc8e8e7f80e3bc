import axios from 'axios';
import { logger } from '../utils/logger';
import { NetworkError, describeError } from '../utils/errors';
import { HttpGetter, isValidCountryCode, isValidIPv4 } from '../utils/network';

export interface DegradedLookup {
  lookup: 'ip' | 'country';
  reason: string;
}

export interface NodeNetworkInfo {
  /** Public IPv4 address, or the placeholder when it could not be discovered */
  ip: string;
  /** Two-letter country code, or the unknown sentinel */
  countryCode: string;
  degraded: DegradedLookup[];
}

export interface NetworkInfoResolverOptions {
  ipEchoUrls: readonly string[];
  /** `{ip}` is replaced by the resolved address */
  geoUrl: string;
  timeoutMs: number;
  ipPlaceholder: string;
  unknownCountry: string;
}

export class NetworkInfoResolver {
  private options: NetworkInfoResolverOptions;
  private http: HttpGetter;

  constructor(options: NetworkInfoResolverOptions, http?: HttpGetter) {
    this.options = options;
    this.http =
      http ??
      axios.create({
        timeout: options.timeoutMs,
        responseType: 'text',
        headers: { 'User-Agent': 'tuicnode' },
      });
  }

  /**
   * Never rejects: failed lookups are replaced by placeholders and reported
   * in `degraded`.
   */
  async resolve(): Promise<NodeNetworkInfo> {
    const degraded: DegradedLookup[] = [];

    let ip = this.options.ipPlaceholder;
    try {
      ip = await this.resolveIp();
    } catch (error) {
      degraded.push({ lookup: 'ip', reason: describeError(error) });
    }

    let countryCode = this.options.unknownCountry;
    if (ip === this.options.ipPlaceholder) {
      degraded.push({ lookup: 'country', reason: 'no public IP to look up' });
    } else {
      try {
        countryCode = await this.resolveCountryCode(ip);
      } catch (error) {
        degraded.push({ lookup: 'country', reason: describeError(error) });
      }
    }

    for (const entry of degraded) {
      logger.warn('Network lookup degraded', { ...entry });
    }
    logger.info('Network info resolved', { ip, countryCode });

    return { ip, countryCode, degraded };
  }

  async resolveIp(): Promise<string> {
    const failures: string[] = [];

    for (const url of this.options.ipEchoUrls) {
      try {
        const ip = await this.getText(url);
        if (isValidIPv4(ip)) {
          return ip;
        }
        failures.push(`${url}: not an IPv4 address`);
      } catch (error) {
        failures.push(`${url}: ${describeError(error)}`);
      }
    }

    throw new NetworkError(`Public IP lookup failed (${failures.join('; ')})`);
  }

  async resolveCountryCode(ip: string): Promise<string> {
    const url = this.options.geoUrl.replace('{ip}', encodeURIComponent(ip));
    const code = await this.getText(url);
    if (!isValidCountryCode(code)) {
      throw new NetworkError(code === '' ? 'Empty country code response' : 'Unexpected country code response');
    }
    return code.toUpperCase();
  }

  private async getText(url: string): Promise<string> {
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.options.timeoutMs,
        responseType: 'text',
      });
      return typeof response.data === 'string' ? response.data.trim() : '';
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new NetworkError(error.message);
      }
      throw error;
    }
  }
}
