import type { AxiosInstance } from 'axios';

const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;
const COUNTRY_CODE_PATTERN = /^[A-Za-z]{2}$/;

/**
 * Dotted-quad shape only; octet ranges are not checked.
 */
export function isValidIPv4(ip: string): boolean {
  return IPV4_PATTERN.test(ip);
}

export function isValidCountryCode(code: string): boolean {
  return COUNTRY_CODE_PATTERN.test(code);
}

/** The slice of an axios instance the lookups and downloads use. */
export type HttpGetter = Pick<AxiosInstance, 'get'>;
