// src/core/url/SchemeNormalizer.ts

import { InvalidBaseURLError, UnsupportedSchemeError } from '../../utils/errors';

/** Port implied by the `hkp` scheme. */
export const HKP_DEFAULT_PORT = '11371';

type SupportedScheme = 'http' | 'https' | 'hkp' | 'hkps';

// Legacy HKP names map onto the transport schemes they ride on
const SCHEME_MAP: Record<SupportedScheme, 'http' | 'https'> = {
  http: 'http',
  https: 'https',
  hkp: 'http',
  hkps: 'https',
};

function stripColon(protocol: string): string {
  return protocol.endsWith(':') ? protocol.slice(0, -1) : protocol;
}

function isMappedScheme(scheme: string): scheme is SupportedScheme {
  return Object.prototype.hasOwnProperty.call(SCHEME_MAP, scheme);
}

/** Accepts a scheme with or without its trailing colon, in any case. */
export function isSupportedScheme(scheme: string): boolean {
  return isMappedScheme(stripColon(scheme).toLowerCase());
}

/**
 * Map the scheme of a parsed base URL onto `http` or `https`.
 *
 * `hkp` becomes `http` on port 11371 unless a port is given; `hkps` becomes
 * `https`. The argument is left untouched and a new URL is returned.
 *
 * @throws {UnsupportedSchemeError} For any scheme other than http, https, hkp or hkps
 * @throws {InvalidBaseURLError} If an hkp/hkps host is not valid under http/https
 */
export function normalizeURL(url: URL): URL {
  const scheme = stripColon(url.protocol);

  if (!isMappedScheme(scheme)) {
    throw new UnsupportedSchemeError(scheme);
  }

  const target = SCHEME_MAP[scheme];
  if (target === scheme) {
    return new URL(url.href);
  }

  // WHATWG URLs refuse a protocol setter that crosses between special and
  // non-special schemes, so reparse with the new scheme instead. Opaque hkp
  // hosts accept values (empty, stray `%`, out-of-range IPv4) that http rejects.
  let rewritten: URL;
  try {
    rewritten = new URL(`${target}:${url.href.slice(url.protocol.length)}`);
  } catch (error) {
    throw new InvalidBaseURLError(url.href, { cause: error });
  }

  if (scheme === 'hkp' && url.port === '') {
    rewritten.port = HKP_DEFAULT_PORT;
  }

  return rewritten;
}
